/**
 * Markup blocks and the element-tree adapter
 *
 * Several block types carry UTF-8 XML. The codec layer only converts between
 * bytes and text; structure is recovered on demand through fast-xml-parser,
 * whose ordered output is flattened into plain `MarkupElement` trees.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { MalformedBlockError } from "../../errors";
import { decodeUtf8 } from "./binary";
import { encodeUtf8 } from "./binary-serializer";
import { DEFAULT_MAX_MARKUP_DEPTH } from "./constants";
import type { BlockCodec } from "./dispatcher";
import { valueMismatch } from "./dispatcher";
import type { MarkupElement } from "./types";

const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

export interface MarkupOptions {
  /** Deepest element nesting accepted (default 4112) */
  maxNesting?: number;
}

const parsers = new Map<number, XMLParser>();

function parserFor(maxNesting: number): XMLParser {
  const cached = parsers.get(maxNesting);
  if (cached !== undefined) {
    return cached;
  }
  const options = {
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: "",
    parseAttributeValue: false,
    parseTagValue: false,
    trimValues: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    // fast-xml-parser otherwise stops at 100 levels
    maxNestedTags: maxNesting,
  };
  const parser = new XMLParser(options);
  parsers.set(maxNesting, parser);
  return parser;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (isRecord(value)) {
    for (const [key, attribute] of Object.entries(value)) {
      attributes[key] = String(attribute);
    }
  }
  return attributes;
}

interface PendingElement {
  readonly name: string;
  readonly attributes: Record<string, string>;
  readonly children: MarkupElement[];
  text: string;
}

/**
 * Convert fast-xml-parser's ordered output without recursion, so deeply
 * nested history markup does not grow the call stack.
 */
function toElements(ordered: unknown): MarkupElement[] {
  const roots: MarkupElement[] = [];
  // Each frame walks one node list and appends into `into`
  const frames: { nodes: unknown[]; next: number; owner?: PendingElement; into: MarkupElement[] }[] = [
    { nodes: Array.isArray(ordered) ? ordered : [], next: 0, into: roots },
  ];

  while (frames.length > 0) {
    const frame = frames[frames.length - 1];
    if (frame === undefined) break;

    if (frame.next >= frame.nodes.length) {
      frames.pop();
      continue;
    }
    const node = frame.nodes[frame.next++];
    if (!isRecord(node)) continue;

    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRIBUTES_KEY) continue;
      if (key === TEXT_KEY) {
        if (frame.owner !== undefined) {
          frame.owner.text += String(value);
        }
        continue;
      }
      const element: PendingElement = {
        name: key,
        attributes: toAttributes(node[ATTRIBUTES_KEY]),
        children: [],
        text: "",
      };
      frame.into.push(element);
      frames.push({
        nodes: Array.isArray(value) ? value : [],
        next: 0,
        owner: element,
        into: element.children,
      });
    }
  }

  return roots;
}

/**
 * Parse XML text into top-level elements
 * @throws {MalformedBlockError} If the text is not well-formed or nests deeper than `maxNesting`
 */
export function parseMarkup(text: string, options: MarkupOptions = {}): MarkupElement[] {
  const maxNesting = options.maxNesting ?? DEFAULT_MAX_MARKUP_DEPTH;
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    throw new MalformedBlockError(
      `Invalid markup: ${validation.err.msg}`,
      `Line ${validation.err.line}, column ${validation.err.col}`
    );
  }

  let ordered: unknown;
  try {
    ordered = parserFor(maxNesting).parse(text);
  } catch (error) {
    throw new MalformedBlockError(
      `Invalid markup: ${error instanceof Error ? error.message : String(error)}`,
      `Nesting limit ${maxNesting}`
    );
  }
  return toElements(ordered);
}

export function childrenNamed(element: MarkupElement, name: string): MarkupElement[] {
  return element.children.filter((child) => child.name === name);
}

export function firstChild(element: MarkupElement, name: string): MarkupElement | undefined {
  return element.children.find((child) => child.name === name);
}

/**
 * First element with the given name among `roots`, searched breadth-first
 */
export function findElement(roots: readonly MarkupElement[], name: string): MarkupElement | undefined {
  const queue = [...roots];
  for (let i = 0; i < queue.length; i++) {
    const element = queue[i];
    if (element === undefined) continue;
    if (element.name === name) {
      return element;
    }
    queue.push(...element.children);
  }
  return undefined;
}

export const markupCodec: BlockCodec = {
  name: "markup",
  decode: (payload) => ({ kind: "markup", text: decodeUtf8(payload) }),
  encode: (value, _ctx, type) => {
    if (value.kind !== "markup") {
      throw valueMismatch(type, "markup", value);
    }
    return encodeUtf8(value.text);
  },
};
