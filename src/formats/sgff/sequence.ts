/**
 * Plain and 2-bit packed sequence codecs
 *
 * Plain blocks (0, 21, 32) are a property flag byte followed by one byte
 * per residue. Block 1 packs DNA four bases to a byte, high bits first,
 * using 00=G 01=A 10=T 11=C.
 */

import { MalformedBlockError, SerializeError, TruncatedSequenceError } from "../../errors";
import { ByteCursor, decodeAscii } from "./binary";
import { ByteWriter, encodeAscii } from "./binary-serializer";
import { BlockType } from "./constants";
import type { BlockCodec } from "./dispatcher";
import { valueMismatch } from "./dispatcher";
import type { CompressedSequence, Sequence, SequenceKind } from "./types";

const FLAG_CIRCULAR = 0x01;
const FLAG_DOUBLE_STRANDED = 0x02;
const FLAG_DAM = 0x04;
const FLAG_DCM = 0x08;
const FLAG_ECOKI = 0x10;
const EXTRA_FLAGS_MASK = 0xe0;

const PACKED_ALPHABET = "GATC";
const BASE_CODES: ReadonlyMap<string, number> = new Map([
  ["G", 0],
  ["A", 1],
  ["T", 2],
  ["C", 3],
]);

/** Size of the u32 base count plus the opaque field */
const COMPRESSED_PREAMBLE = 18;
export const RESERVED_SIZE = 14;

/**
 * Bytes needed to pack `count` bases at 2 bits each
 */
export function packedLength(count: number): number {
  return Math.ceil((count * 2) / 8);
}

// =============================================================================
// PLAIN SEQUENCES
// =============================================================================

export function decodeSequenceFlags(flags: number): Omit<Sequence, "kind" | "bases"> {
  return {
    topology: flags & FLAG_CIRCULAR ? "circular" : "linear",
    strandedness: flags & FLAG_DOUBLE_STRANDED ? "double" : "single",
    methylation: {
      dam: (flags & FLAG_DAM) !== 0,
      dcm: (flags & FLAG_DCM) !== 0,
      ecoKI: (flags & FLAG_ECOKI) !== 0,
    },
    extraFlags: flags & EXTRA_FLAGS_MASK,
  };
}

export function encodeSequenceFlags(sequence: Omit<Sequence, "kind" | "bases">): number {
  let flags = sequence.extraFlags & EXTRA_FLAGS_MASK;
  if (sequence.topology === "circular") flags |= FLAG_CIRCULAR;
  if (sequence.strandedness === "double") flags |= FLAG_DOUBLE_STRANDED;
  if (sequence.methylation.dam) flags |= FLAG_DAM;
  if (sequence.methylation.dcm) flags |= FLAG_DCM;
  if (sequence.methylation.ecoKI) flags |= FLAG_ECOKI;
  return flags;
}

/**
 * Decode a flag byte plus residues
 * @throws {TruncatedSequenceError} If the flag byte is missing
 */
export function decodePlainSequence(bytes: Uint8Array, kind: SequenceKind): Sequence {
  const flags = bytes[0];
  if (flags === undefined) {
    throw new TruncatedSequenceError("Sequence block has no property flag byte", 1, 0);
  }
  return {
    kind,
    bases: decodeAscii(bytes.subarray(1)),
    ...decodeSequenceFlags(flags),
  };
}

export function encodePlainSequence(sequence: Sequence): Uint8Array {
  return new ByteWriter()
    .uint8(encodeSequenceFlags(sequence))
    .bytes(encodeAscii(sequence.bases))
    .toUint8Array();
}

// =============================================================================
// 2-BIT PACKING
// =============================================================================

export function unpackBases(packed: Uint8Array, count: number): string {
  const chars: string[] = new Array<string>(count);
  for (let i = 0; i < count; i++) {
    const byte = packed[i >> 2] ?? 0;
    const shift = 6 - 2 * (i & 3);
    chars[i] = PACKED_ALPHABET.charAt((byte >> shift) & 0x03);
  }
  return chars.join("");
}

/**
 * Pack bases four to a byte; a partial final byte is padded with zero bits
 * @throws {SerializeError} On a character outside G, A, T, C
 */
export function packBases(bases: string): Uint8Array {
  const packed = new Uint8Array(packedLength(bases.length));
  for (let i = 0; i < bases.length; i++) {
    const base = bases.charAt(i);
    const code = BASE_CODES.get(base);
    if (code === undefined) {
      throw new SerializeError(
        `Cannot pack '${base}' at position ${i}: compressed DNA holds only G, A, T and C`
      );
    }
    packed[i >> 2] = (packed[i >> 2] ?? 0) | (code << (6 - 2 * (i & 3)));
  }
  return packed;
}

/**
 * Whether the unused low bits of a partial final byte are set
 */
export function hasPadBits(packed: Uint8Array, count: number): boolean {
  const used = count & 3;
  if (used === 0) return false;
  const last = packed[packed.length - 1] ?? 0;
  return (last & (0xff >> (2 * used))) !== 0;
}

// =============================================================================
// COMPRESSED SEQUENCES
// =============================================================================

/**
 * Decode a compressed DNA body starting at its u32 compressed-length field
 *
 * @returns The sequence and the number of bytes the body occupies
 * (4 plus the compressed length)
 * @throws {TruncatedSequenceError} If the declared lengths run past the input
 */
export function decodeCompressedSequence(bytes: Uint8Array): {
  sequence: CompressedSequence;
  consumed: number;
} {
  if (bytes.length < 4 + COMPRESSED_PREAMBLE) {
    throw new TruncatedSequenceError(
      `Compressed sequence needs at least ${4 + COMPRESSED_PREAMBLE} bytes of preamble`,
      4 + COMPRESSED_PREAMBLE,
      bytes.length
    );
  }

  const cursor = new ByteCursor(bytes);
  const compressedLength = cursor.uint32();
  const count = cursor.uint32();
  const packedSize = packedLength(count);

  if (compressedLength < COMPRESSED_PREAMBLE + packedSize) {
    throw new TruncatedSequenceError(
      `Compressed length ${compressedLength} cannot hold ${count} packed bases`,
      COMPRESSED_PREAMBLE + packedSize,
      compressedLength
    );
  }
  if (4 + compressedLength > bytes.length) {
    throw new TruncatedSequenceError(
      `Compressed sequence declares ${compressedLength} bytes but only ${bytes.length - 4} follow`,
      compressedLength,
      bytes.length - 4
    );
  }

  const reserved = cursor.bytesOf(RESERVED_SIZE).slice();
  const packed = cursor.bytesOf(packedSize);
  const trailing = bytes.slice(cursor.offset, 4 + compressedLength);
  const bases = unpackBases(packed, count);

  const sequence: CompressedSequence = { length: count, reserved, bases, trailing };
  if (hasPadBits(packed, count)) {
    sequence.packing = { bases, packed: packed.slice() };
  }
  return { sequence, consumed: 4 + compressedLength };
}

/**
 * @throws {SerializeError} If the base count, reserved field or alphabet is inconsistent
 */
export function encodeCompressedSequence(sequence: CompressedSequence): Uint8Array {
  if (sequence.length !== sequence.bases.length) {
    throw new SerializeError(
      `Compressed sequence declares ${sequence.length} bases but holds ${sequence.bases.length}`
    );
  }
  if (sequence.reserved.length !== RESERVED_SIZE) {
    throw new SerializeError(
      `Compressed sequence reserved field must be ${RESERVED_SIZE} bytes, got ${sequence.reserved.length}`
    );
  }

  const packed =
    sequence.packing !== undefined && sequence.packing.bases === sequence.bases
      ? sequence.packing.packed
      : packBases(sequence.bases);
  return new ByteWriter()
    .uint32(COMPRESSED_PREAMBLE + packed.length + sequence.trailing.length)
    .uint32(sequence.length)
    .bytes(sequence.reserved)
    .bytes(packed)
    .bytes(sequence.trailing)
    .toUint8Array();
}

// =============================================================================
// BLOCK CODECS
// =============================================================================

function kindForBlock(type: number): SequenceKind {
  switch (type) {
    case BlockType.RNA:
      return "RNA";
    case BlockType.PROTEIN:
      return "Protein";
    default:
      return "DNA";
  }
}

export const plainSequenceCodec: BlockCodec = {
  name: "sequence",
  decode: (payload, _ctx, type) => ({
    kind: "sequence",
    sequence: decodePlainSequence(payload, kindForBlock(type)),
  }),
  encode: (value, _ctx, type) => {
    if (value.kind !== "sequence") {
      throw valueMismatch(type, "sequence", value);
    }
    return encodePlainSequence(value.sequence);
  },
};

export const compressedSequenceCodec: BlockCodec = {
  name: "compressed-sequence",
  decode: (payload) => {
    const { sequence, consumed } = decodeCompressedSequence(payload);
    if (consumed !== payload.length) {
      throw new MalformedBlockError(
        `Compressed length field covers ${consumed} bytes but the block holds ${payload.length}`
      );
    }
    return { kind: "compressed-sequence", sequence };
  },
  encode: (value, _ctx, type) => {
    if (value.kind !== "compressed-sequence") {
      throw valueMismatch(type, "compressed-sequence", value);
    }
    return encodeCompressedSequence(value.sequence);
  },
};
