/**
 * Tests for feature, note, primer, property and alignable-sequence readers
 */

import { describe, expect, test } from "vitest";
import {
  getAlignableSequences,
  getFeatures,
  getNotes,
  getPrimers,
  getProperties,
  parseSnapGene,
} from "../../../src/formats/sgff";
import {
  parseAlignableSequences,
  parseFeatures,
  parseNotes,
  parsePrimers,
  parseProperties,
  parseRange,
} from "../../../src/formats/sgff/annotations";
import { ascii, block, concat, minimalTrace, snapgeneFile, u32 } from "../../utils/sgff-builders";

const PROPERTIES_XML =
  "<AdditionalSequenceProperties><UpstreamStickiness>0</UpstreamStickiness>" +
  "<UpstreamModification>Unmodified</UpstreamModification>" +
  "<DownstreamModification>5' phosphorylated</DownstreamModification></AdditionalSequenceProperties>";

describe("parseRange", () => {
  test("converts 1-based inclusive ranges", () => {
    expect(parseRange("1-10")).toEqual({ start: 0, end: 10 });
    expect(parseRange("10-1")).toEqual({ start: 0, end: 10 });
    expect(parseRange("7")).toEqual({ start: 6, end: 7 });
  });

  test("returns undefined for a missing or empty range", () => {
    expect(parseRange(undefined)).toBeUndefined();
    expect(parseRange("")).toBeUndefined();
  });
});

describe("parseFeatures", () => {
  const xml = `<Features nextValidID="2">
    <Feature recentID="0" name="AmpR" directionality="2" type="CDS" color="#ccccff">
      <Segment range="100-960" color="#ccccff" type="standard"/>
      <Q name="gene"><V text="bla"/></Q>
      <Q name="codon_start"><V int="1"/></Q>
      <Q name="note"><V text="first"/><V text="second"/></Q>
    </Feature>
    <Feature name="split" directionality="1" type="misc_feature">
      <Segment range="50-40" color="#ff0000"/>
      <Segment range="70-80"/>
    </Feature>
    <Feature name="bare" type="source"/>
  </Features>`;

  test("reads names, types, strands and qualifiers", () => {
    const [ampR] = parseFeatures(xml);
    expect(ampR).toEqual({
      name: "AmpR",
      type: "CDS",
      strand: "reverse",
      start: 99,
      end: 960,
      color: "#ccccff",
      segments: [{ start: 99, end: 960, color: "#ccccff", type: "standard" }],
      qualifiers: { gene: "bla", codon_start: "1", note: "first, second" },
    });
  });

  test("spans every segment and falls back to the first segment's color", () => {
    const split = parseFeatures(xml)[1];
    expect(split?.strand).toBe("forward");
    expect(split?.start).toBe(39);
    expect(split?.end).toBe(80);
    expect(split?.color).toBe("#ff0000");
    expect(split?.segments).toHaveLength(2);
  });

  test("defaults a feature without segments or direction", () => {
    const bare = parseFeatures(xml)[2];
    expect(bare?.strand).toBe("none");
    expect(bare?.start).toBe(0);
    expect(bare?.end).toBe(0);
    expect(bare?.qualifiers).toEqual({});
  });

  test("returns an empty list without a Features element", () => {
    expect(parseFeatures("<Other/>")).toEqual([]);
  });
});

describe("parseNotes", () => {
  test("maps child elements to their text", () => {
    expect(
      parseNotes(`<Notes><UUID>abc-123</UUID><Type>Synthetic</Type><Description>test plasmid</Description></Notes>`)
    ).toEqual({ UUID: "abc-123", Type: "Synthetic", Description: "test plasmid" });
  });
});

describe("parseProperties", () => {
  test("maps property elements to their text", () => {
    expect(parseProperties(PROPERTIES_XML)).toEqual({
      UpstreamStickiness: "0",
      UpstreamModification: "Unmodified",
      DownstreamModification: "5' phosphorylated",
    });
  });

  test("falls back to the first element when the wrapper is named differently", () => {
    expect(parseProperties("<Properties><Circular>1</Circular></Properties>")).toEqual({ Circular: "1" });
  });
});

describe("parsePrimers", () => {
  test("reads binding sites and their strands", () => {
    const primers = parsePrimers(`<Primers nextValidID="2">
      <Primer name="M13 fwd" sequence="GTAAAACGACGGCCAGT" description="universal">
        <BindingSite location="10-26" boundStrand="0"/>
        <BindingSite location="200-216" boundStrand="1"/>
      </Primer>
    </Primers>`);

    expect(primers).toHaveLength(1);
    expect(primers[0]?.name).toBe("M13 fwd");
    expect(primers[0]?.sequence).toBe("GTAAAACGACGGCCAGT");
    expect(primers[0]?.description).toBe("universal");
    expect(primers[0]?.bindingSites).toEqual([
      { start: 9, end: 26, strand: "forward" },
      { start: 199, end: 216, strand: "reverse" },
    ]);
  });
});

describe("parseAlignableSequences", () => {
  test("lists each sequence with its attributes", () => {
    expect(
      parseAlignableSequences(
        `<AlignableSequences trimStringency="Medium"><Sequence name="read1" sequence="ACGT" trimmedRange="0-4"/></AlignableSequences>`
      )
    ).toEqual([
      { name: "read1", sequence: "ACGT", attributes: { name: "read1", sequence: "ACGT", trimmedRange: "0-4" } },
    ]);
  });
});

describe("file accessors", () => {
  test("read annotations from their blocks", () => {
    const file = parseSnapGene(
      snapgeneFile(
        block(10, ascii(`<Features><Feature name="ori" type="rep_origin"><Segment range="1-5"/></Feature></Features>`)),
        block(6, ascii("<Notes><Type>Natural</Type></Notes>")),
        block(5, ascii(`<Primers><Primer name="p1" sequence="AAA"/></Primers>`)),
        block(17, ascii(`<AlignableSequences><Sequence name="s" sequence="TT"/></AlignableSequences>`))
      ),
      { onWarning: () => undefined }
    );

    expect(getFeatures(file).map((feature) => [feature.name, feature.start, feature.end])).toEqual([["ori", 0, 5]]);
    expect(getNotes(file)).toEqual({ Type: "Natural" });
    expect(getPrimers(file).map((primer) => primer.name)).toEqual(["p1"]);
    expect(getAlignableSequences(file).map((sequence) => sequence.sequence)).toEqual(["TT"]);
  });

  test("return empty results when the blocks are absent", () => {
    const file = parseSnapGene(snapgeneFile(), { onWarning: () => undefined });
    expect(getFeatures(file)).toEqual([]);
    expect(getNotes(file)).toEqual({});
    expect(getPrimers(file)).toEqual([]);
    expect(getAlignableSequences(file)).toEqual([]);
    expect(getProperties(file)).toEqual({});
  });

  test("read properties from the file and from a trace container", () => {
    const file = parseSnapGene(
      snapgeneFile(
        block(8, ascii(PROPERTIES_XML)),
        block(16, concat(u32(0), block(18, minimalTrace()), block(8, ascii("<AdditionalSequenceProperties><Read>r1</Read></AdditionalSequenceProperties>"))))
      ),
      { onWarning: () => undefined }
    );
    const traceBlock = file.blocks.get(16);
    if (traceBlock?.kind !== "trace-container") throw new Error("expected a trace container");

    expect(getProperties(file)["UpstreamModification"]).toBe("Unmodified");
    expect(getProperties(traceBlock.container)).toEqual({ Read: "r1" });
  });
});
