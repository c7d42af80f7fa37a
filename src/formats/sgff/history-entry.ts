/**
 * History node records (block 11)
 *
 * Layout: u32 node index, u8 sequence tag, the tagged snapshot, then an
 * uncompressed TLV stream of node properties. The tag selects a plain
 * sequence (u32 length + residues), a compressed DNA body, or nothing.
 */

import { TruncatedSequenceError, UnknownSequenceTypeError } from "../../errors";
import { ByteCursor, decodeAscii } from "./binary";
import { ByteWriter, encodeAscii } from "./binary-serializer";
import { BlockType } from "./constants";
import type { BlockCodec, DecodeContext, EncodeContext } from "./dispatcher";
import { decodeBlocks, descend, serializeBlocks, valueMismatch } from "./dispatcher";
import { decodeCompressedSequence, encodeCompressedSequence } from "./sequence";
import type { HistoryEntry, HistorySequence, SequenceKind } from "./types";

export const HistorySequenceTag = {
  DNA: 0,
  COMPRESSED_DNA: 1,
  PROTEIN: 21,
  MODIFIER: 29,
  RNA: 32,
} as const;

const PLAIN_TAGS: ReadonlyMap<number, SequenceKind> = new Map([
  [HistorySequenceTag.DNA, "DNA"],
  [HistorySequenceTag.RNA, "RNA"],
  [HistorySequenceTag.PROTEIN, "Protein"],
]);

const PLAIN_TAG_FOR_KIND: Readonly<Record<SequenceKind, number>> = {
  DNA: HistorySequenceTag.DNA,
  RNA: HistorySequenceTag.RNA,
  Protein: HistorySequenceTag.PROTEIN,
};

/** Node properties never carry another history tree or history node */
const NODE_INFO_EXCLUDED: ReadonlySet<number> = new Set([BlockType.HISTORY_TREE, BlockType.HISTORY_NODE]);

function readSnapshot(cursor: ByteCursor, bytes: Uint8Array, tag: number): HistorySequence {
  const kind = PLAIN_TAGS.get(tag);
  if (kind !== undefined) {
    const length = cursor.uint32();
    if (length > cursor.remaining) {
      throw new TruncatedSequenceError(
        `History sequence declares ${length} residues but only ${cursor.remaining} bytes follow`,
        length,
        cursor.remaining
      );
    }
    return { kind: "plain", sequenceKind: kind, bases: decodeAscii(cursor.bytesOf(length)) };
  }

  switch (tag) {
    case HistorySequenceTag.COMPRESSED_DNA: {
      const { sequence, consumed } = decodeCompressedSequence(bytes.subarray(cursor.offset));
      cursor.skip(consumed);
      return { kind: "compressed", sequence };
    }
    case HistorySequenceTag.MODIFIER:
      return { kind: "modifier" };
    default:
      throw new UnknownSequenceTypeError(tag);
  }
}

/**
 * @throws {UnknownSequenceTypeError} If the tag is not 0, 1, 21, 29 or 32
 * @throws {TruncatedSequenceError} If the snapshot is shorter than declared
 */
export function decodeHistoryEntry(bytes: Uint8Array, ctx: DecodeContext): HistoryEntry {
  const cursor = new ByteCursor(bytes);
  const nodeIndex = cursor.uint32();
  const tag = cursor.uint8();
  const sequence = readSnapshot(cursor, bytes, tag);

  const entry: HistoryEntry = { nodeIndex, sequence };
  if (!cursor.done) {
    entry.nodeInfo = decodeBlocks(cursor.rest(), descend(ctx, NODE_INFO_EXCLUDED));
  }
  return entry;
}

export function encodeHistoryEntry(entry: HistoryEntry, ctx: EncodeContext): Uint8Array {
  const writer = new ByteWriter().uint32(entry.nodeIndex);
  const { sequence } = entry;

  switch (sequence.kind) {
    case "plain": {
      const residues = encodeAscii(sequence.bases);
      writer.uint8(PLAIN_TAG_FOR_KIND[sequence.sequenceKind]).uint32(residues.length).bytes(residues);
      break;
    }
    case "compressed":
      writer.uint8(HistorySequenceTag.COMPRESSED_DNA).bytes(encodeCompressedSequence(sequence.sequence));
      break;
    case "modifier":
      writer.uint8(HistorySequenceTag.MODIFIER);
      break;
  }

  if (entry.nodeInfo !== undefined) {
    writer.bytes(serializeBlocks(entry.nodeInfo, descend(ctx, NODE_INFO_EXCLUDED)));
  }
  return writer.toUint8Array();
}

export const historyEntryCodec: BlockCodec = {
  name: "history-entry",
  decode: (payload, ctx) => ({ kind: "history-entry", entry: decodeHistoryEntry(payload, ctx) }),
  encode: (value, ctx, type) => {
    if (value.kind !== "history-entry") {
      throw valueMismatch(type, "history-entry", value);
    }
    return encodeHistoryEntry(value.entry, ctx);
  },
};
