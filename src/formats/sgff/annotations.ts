/**
 * Readers for the markup annotation blocks
 *
 * Features (block 10), notes (6), primers (5), sequence properties (8) and
 * alignable sequences (17) are XML documents. Ranges in the markup are 1-based and inclusive; they
 * are reported as 0-based starts with 1-based ends.
 */

import { childrenNamed, findElement, parseMarkup } from "./markup";
import type {
  AlignableSequence,
  Feature,
  FeatureSegment,
  FeatureStrand,
  MarkupElement,
  Primer,
  PrimerBindingSite,
} from "./types";

const STRANDS: Readonly<Record<string, FeatureStrand>> = {
  "0": "none",
  "1": "forward",
  "2": "reverse",
  "3": "both",
};

/**
 * Parse "a-b" (either order) into a 0-based start and 1-based end
 */
export function parseRange(range: string | undefined): { start: number; end: number } | undefined {
  if (range === undefined) return undefined;
  const bounds = range
    .split("-")
    .map((part) => Number.parseInt(part, 10))
    .filter((value) => Number.isFinite(value));
  const first = bounds[0];
  if (first === undefined) return undefined;
  const second = bounds[1] ?? first;
  return { start: Math.min(first, second) - 1, end: Math.max(first, second) };
}

function qualifierValue(qualifier: MarkupElement): string {
  return childrenNamed(qualifier, "V")
    .map((v) => v.attributes["text"] ?? v.attributes["int"] ?? v.attributes["predef"] ?? v.text)
    .join(", ");
}

function toFeature(element: MarkupElement): Feature {
  const segments: FeatureSegment[] = [];
  for (const segment of childrenNamed(element, "Segment")) {
    const range = parseRange(segment.attributes["range"]);
    if (range === undefined) continue;
    segments.push({
      ...range,
      color: segment.attributes["color"],
      type: segment.attributes["type"],
    });
  }

  const qualifiers: Record<string, string> = {};
  for (const q of childrenNamed(element, "Q")) {
    const name = q.attributes["name"];
    if (name !== undefined) {
      qualifiers[name] = qualifierValue(q);
    }
  }

  return {
    name: element.attributes["name"] ?? "",
    type: element.attributes["type"] ?? "",
    strand: STRANDS[element.attributes["directionality"] ?? "0"] ?? "none",
    start: segments.length > 0 ? Math.min(...segments.map((s) => s.start)) : 0,
    end: segments.length > 0 ? Math.max(...segments.map((s) => s.end)) : 0,
    color: element.attributes["color"] ?? segments[0]?.color,
    segments,
    qualifiers,
  };
}

export function parseFeatures(text: string): Feature[] {
  const features = findElement(parseMarkup(text), "Features");
  return features === undefined ? [] : childrenNamed(features, "Feature").map(toFeature);
}

/**
 * Notes as element name to text
 */
export function parseNotes(text: string): Record<string, string> {
  const notes = findElement(parseMarkup(text), "Notes");
  const result: Record<string, string> = {};
  for (const child of notes?.children ?? []) {
    result[child.name] = child.text;
  }
  return result;
}

/**
 * Sequence properties as element name to text, e.g. end modifications and
 * stickiness under `<AdditionalSequenceProperties>`
 */
export function parseProperties(text: string): Record<string, string> {
  const roots = parseMarkup(text);
  const properties = findElement(roots, "AdditionalSequenceProperties") ?? roots[0];
  const result: Record<string, string> = {};
  for (const child of properties?.children ?? []) {
    result[child.name] = child.text;
  }
  return result;
}

function toBindingSite(site: MarkupElement): PrimerBindingSite | undefined {
  const range = parseRange(site.attributes["location"]);
  if (range === undefined) return undefined;
  return { ...range, strand: site.attributes["boundStrand"] === "1" ? "reverse" : "forward" };
}

export function parsePrimers(text: string): Primer[] {
  const primers = findElement(parseMarkup(text), "Primers");
  if (primers === undefined) return [];

  return childrenNamed(primers, "Primer").map((primer) => {
    const bindingSites: PrimerBindingSite[] = [];
    for (const site of childrenNamed(primer, "BindingSite")) {
      const parsed = toBindingSite(site);
      if (parsed !== undefined) bindingSites.push(parsed);
    }
    return {
      name: primer.attributes["name"] ?? "",
      sequence: primer.attributes["sequence"] ?? "",
      description: primer.attributes["description"],
      bindingSites,
      attributes: { ...primer.attributes },
    };
  });
}

export function parseAlignableSequences(text: string): AlignableSequence[] {
  const root = findElement(parseMarkup(text), "AlignableSequences");
  if (root === undefined) return [];

  return childrenNamed(root, "Sequence").map((sequence) => ({
    name: sequence.attributes["name"] ?? "",
    sequence: sequence.attributes["sequence"] ?? "",
    attributes: { ...sequence.attributes },
  }));
}
