/**
 * Tests for history node records (block 11)
 */

import { describe, expect, test, vi } from "vitest";
import {
  NestingTooDeepError,
  TruncatedSequenceError,
  UnknownSequenceTypeError,
} from "../../../src/errors";
import { parseSnapGene, serializeSnapGene } from "../../../src/formats/sgff";
import type { HistoryEntry } from "../../../src/formats/sgff/types";
import { passthroughCompressor } from "../../utils/compression-layers";
import { ascii, block, concat, plainSequence, snapgeneFile, u32 } from "../../utils/sgff-builders";

const quiet = () => undefined;

function entryOf(bytes: Uint8Array): HistoryEntry {
  const file = parseSnapGene(snapgeneFile(block(11, bytes)), {
    compressor: passthroughCompressor,
    onWarning: quiet,
  });
  const value = file.blocks.get(11);
  if (value?.kind !== "history-entry") {
    throw new Error(`expected a history entry, got ${value?.kind}`);
  }
  return value.entry;
}

describe("history entries", () => {
  test("decodes a plain DNA snapshot", () => {
    const entry = entryOf(concat(u32(3), new Uint8Array([0]), u32(4), ascii("ACGT")));

    expect(entry.nodeIndex).toBe(3);
    expect(entry.sequence).toEqual({ kind: "plain", sequenceKind: "DNA", bases: "ACGT" });
    expect(entry.nodeInfo).toBeUndefined();
  });

  test("maps tags 21 and 32 to protein and RNA", () => {
    expect(entryOf(concat(u32(0), new Uint8Array([21]), u32(2), ascii("MK"))).sequence).toEqual({
      kind: "plain",
      sequenceKind: "Protein",
      bases: "MK",
    });
    expect(entryOf(concat(u32(0), new Uint8Array([32]), u32(1), ascii("U"))).sequence).toEqual({
      kind: "plain",
      sequenceKind: "RNA",
      bases: "U",
    });
  });

  test("decodes a packed DNA snapshot", () => {
    const body = concat(u32(19), u32(4), new Uint8Array(14), new Uint8Array([0x1b]));
    const entry = entryOf(concat(u32(1), new Uint8Array([1]), body));

    expect(entry.sequence.kind).toBe("compressed");
    if (entry.sequence.kind !== "compressed") return;
    expect(entry.sequence.sequence.bases).toBe("GATC");
    expect(entry.sequence.sequence.length).toBe(4);
    expect(entry.sequence.sequence.trailing).toEqual(new Uint8Array(0));
  });

  test("accepts a modifier with no snapshot", () => {
    const entry = entryOf(concat(u32(7), new Uint8Array([29])));
    expect(entry.sequence).toEqual({ kind: "modifier" });
  });

  test("decodes node properties and keeps history blocks in them raw", () => {
    const onWarning = vi.fn();
    const bytes = snapgeneFile(
      block(
        11,
        concat(
          u32(2),
          new Uint8Array([29]),
          block(0, plainSequence(0x01, "GG")),
          block(7, ascii("<HistoryTree/>"))
        )
      )
    );

    const file = parseSnapGene(bytes, { compressor: passthroughCompressor, onWarning });
    const value = file.blocks.get(11);
    if (value?.kind !== "history-entry") throw new Error("expected a history entry");
    const info = value.entry.nodeInfo;

    expect(info?.types()).toEqual([0, 7]);
    const sequence = info?.get(0);
    expect(sequence?.kind === "sequence" && sequence.sequence.topology).toBe("circular");
    expect(info?.get(7)).toEqual({ kind: "raw", bytes: ascii("<HistoryTree/>") });
    expect(onWarning).not.toHaveBeenCalled();
    expect(serializeSnapGene(file, { compressor: passthroughCompressor })).toEqual(bytes);
  });

  test("round-trips every snapshot kind", () => {
    const bytes = snapgeneFile(
      block(11, concat(u32(0), new Uint8Array([0]), u32(2), ascii("AT"))),
      block(11, concat(u32(1), new Uint8Array([1]), u32(19), u32(3), new Uint8Array(14), new Uint8Array([0x1c]))),
      block(11, concat(u32(2), new Uint8Array([29])))
    );
    const file = parseSnapGene(bytes, { onWarning: quiet });
    expect(file.blocks.count(11)).toBe(3);
    expect(serializeSnapGene(file)).toEqual(bytes);
  });

  test("rejects an unknown sequence tag", () => {
    let caught: unknown;
    try {
      entryOf(concat(u32(0), new Uint8Array([5])));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(UnknownSequenceTypeError);
    if (!(caught instanceof UnknownSequenceTypeError)) return;
    expect(caught.tag).toBe(5);
    expect(caught.blockPath).toEqual([11]);
    expect(caught.offset).toBe(19);
  });

  test("rejects a plain snapshot longer than the record", () => {
    expect(() => entryOf(concat(u32(0), new Uint8Array([0]), u32(10), ascii("AC")))).toThrow(
      TruncatedSequenceError
    );
  });

  test("counts node properties towards the nesting limit", () => {
    const bytes = snapgeneFile(
      block(11, concat(u32(0), new Uint8Array([29]), block(30, block(0, plainSequence(0, "A")))))
    );

    let caught: unknown;
    try {
      parseSnapGene(bytes, { compressor: passthroughCompressor, maxDepth: 1, onWarning: quiet });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(NestingTooDeepError);
    expect(caught instanceof NestingTooDeepError && caught.blockPath).toEqual([11, 30]);
  });
});
