/**
 * Tests for LZMA-wrapped containers and markup
 */

import { describe, expect, test } from "vitest";
import { compress as xzCompress } from "../../../src/compression/xz";
import { CompressionError, NestingTooDeepError, SnapGeneError } from "../../../src/errors";
import { parseSnapGene, serializeSnapGene } from "../../../src/formats/sgff";
import { ascii, block, plainSequence, snapgeneFile } from "../../utils/sgff-builders";
import { passthroughCompressor, recordingCompressor } from "../../utils/compression-layers";

const quiet = () => undefined;

function nest(levels: number, inner: Uint8Array): Uint8Array {
  let bytes = inner;
  for (let i = 0; i < levels; i++) {
    bytes = block(30, bytes);
  }
  return bytes;
}

describe("nested container (block 30)", () => {
  test("decodes an xz-compressed TLV stream", () => {
    const inner = block(0, plainSequence(0x03, "ACGT"));
    const bytes = snapgeneFile(block(30, xzCompress(inner)));

    const file = parseSnapGene(bytes, { onWarning: quiet });
    const value = file.blocks.get(30);

    expect(value?.kind).toBe("container");
    if (value?.kind !== "container") return;
    const sequence = value.blocks.get(0);
    expect(sequence?.kind === "sequence" && sequence.sequence.bases).toBe("ACGT");
    expect(value.origin?.uncompressed).toEqual(inner);
  });

  test("writes an untouched container back byte for byte", () => {
    const bytes = snapgeneFile(
      block(0, plainSequence(0, "GG")),
      block(30, xzCompress(block(6, ascii("<Notes/>")))),
      block(99, new Uint8Array([9, 9]))
    );

    const file = parseSnapGene(bytes, { onWarning: quiet });
    expect(serializeSnapGene(file)).toEqual(bytes);
  });

  test("recompresses only when the nested content changed", () => {
    const compressor = recordingCompressor();
    const bytes = snapgeneFile(block(30, block(0, plainSequence(0, "AC"))));
    const file = parseSnapGene(bytes, { compressor, onWarning: quiet });

    expect(serializeSnapGene(file, { compressor })).toEqual(bytes);
    expect(compressor.calls).toEqual([{ operation: "decompress", format: "xz" }]);

    const value = file.blocks.get(30);
    if (value?.kind !== "container") throw new Error("expected a container");
    const inner = value.blocks.get(0);
    if (inner?.kind !== "sequence") throw new Error("expected a sequence");
    inner.sequence.bases = "ACG";

    const edited = serializeSnapGene(file, { compressor });
    expect(compressor.calls.at(-1)).toEqual({ operation: "compress", format: "xz" });
    expect(edited).toEqual(snapgeneFile(block(30, block(0, plainSequence(0, "ACG")))));
  });

  test("re-reads edited content after real recompression", () => {
    const bytes = snapgeneFile(block(30, xzCompress(block(0, plainSequence(0, "AC")))));
    const file = parseSnapGene(bytes, { onWarning: quiet });
    const value = file.blocks.get(30);
    if (value?.kind !== "container") throw new Error("expected a container");
    value.blocks.set(0, {
      kind: "sequence",
      sequence: {
        kind: "DNA",
        bases: "TTTT",
        topology: "linear",
        strandedness: "single",
        methylation: { dam: false, dcm: false, ecoKI: false },
        extraFlags: 0,
      },
    });

    const reparsed = parseSnapGene(serializeSnapGene(file), { onWarning: quiet });
    const nested = reparsed.blocks.get(30);
    const sequence = nested?.kind === "container" ? nested.blocks.get(0) : undefined;
    expect(sequence?.kind === "sequence" && sequence.sequence.bases).toBe("TTTT");
  });

  test("enforces the nesting limit", () => {
    const bytes = snapgeneFile(nest(3, block(0, plainSequence(0, "A"))));

    expect(() =>
      parseSnapGene(bytes, { compressor: passthroughCompressor, maxDepth: 3, onWarning: quiet })
    ).not.toThrow();

    let caught: unknown;
    try {
      parseSnapGene(bytes, { compressor: passthroughCompressor, maxDepth: 2, onWarning: quiet });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(NestingTooDeepError);
    if (!(caught instanceof NestingTooDeepError)) return;
    expect(caught.limit).toBe(2);
    expect(caught.structure).toBe("container");
    expect(caught.blockPath).toEqual([30, 30, 30]);
    expect(caught.offset).toBe(0);
  });

  test("defaults to a limit of 8", () => {
    const inner = block(0, plainSequence(0, "A"));
    const options = { compressor: passthroughCompressor, onWarning: quiet };

    expect(() => parseSnapGene(snapgeneFile(nest(8, inner)), options)).not.toThrow();
    expect(() => parseSnapGene(snapgeneFile(nest(9, inner)), options)).toThrow(NestingTooDeepError);
  });

  test("reports a corrupt xz payload as a compression error inside block 30", () => {
    const bytes = snapgeneFile(block(30, new Uint8Array([1, 2, 3, 4])));

    let caught: unknown;
    try {
      parseSnapGene(bytes, { onWarning: quiet });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CompressionError);
    expect(caught instanceof SnapGeneError && caught.blockPath).toEqual([30]);
  });
});

describe("compressed markup (blocks 7 and 29)", () => {
  test("decodes to text and keeps the original compressed bytes", () => {
    const text = "<HistoryModifiers><Modifier/></HistoryModifiers>";
    const compressed = xzCompress(ascii(text));
    const bytes = snapgeneFile(block(29, compressed));

    const file = parseSnapGene(bytes, { onWarning: quiet });
    const value = file.blocks.get(29);

    expect(value?.kind === "compressed-markup" && value.text).toBe(text);
    expect(serializeSnapGene(file)).toEqual(bytes);
  });

  test("recompresses edited text", () => {
    const compressor = recordingCompressor();
    const file = parseSnapGene(snapgeneFile(block(7, ascii("<HistoryTree/>"))), {
      compressor,
      onWarning: quiet,
    });
    file.blocks.set(7, { kind: "compressed-markup", text: "<HistoryTree></HistoryTree>" });

    expect(serializeSnapGene(file, { compressor })).toEqual(
      snapgeneFile(block(7, ascii("<HistoryTree></HistoryTree>")))
    );
    expect(compressor.calls.at(-1)).toEqual({ operation: "compress", format: "xz" });
  });
});
