/**
 * TLV stream walker and writer
 *
 * A stream is a run of records: 1-byte type, big-endian u32 length, payload.
 * Registered types go through their codec; everything else is kept as raw
 * bytes. Codecs for nested streams call back into `decodeBlocks` and
 * `encodeBlocks` with a context produced by `descend`, which is where the
 * nesting limit is enforced.
 */

import {
  InvalidHeaderError,
  NestingTooDeepError,
  SerializeError,
  TruncatedBlockError,
  toSnapGeneError,
} from "../../errors";
import type { Compressor, TraceCompression, WarningHandler } from "../../types";
import { decodeAscii, readUInt16BE, readUInt32BE } from "./binary";
import { ByteWriter, encodeAscii } from "./binary-serializer";
import {
  BLOCK_HEADER_SIZE,
  HEADER_LENGTH_FIELD,
  HEADER_MAGIC,
  HEADER_SIZE,
  HEADER_TITLE,
  SEQUENCE_KIND_CODES,
  SEQUENCE_KIND_TO_CODE,
} from "./constants";
import { BlockContainer } from "./container";
import type { BlockValue, BlockValueKind, Header } from "./types";

// =============================================================================
// CODEC CONTRACT
// =============================================================================

export interface CodecContext {
  /** Nesting level of the stream being processed; the file body is 0 */
  readonly depth: number;
  readonly maxDepth: number;
  readonly compressor: Compressor;
  readonly codecs: CodecTable;
  /** Types kept raw in this stream even though a codec exists */
  readonly excluded: ReadonlySet<number>;
  readonly onWarning: WarningHandler;
}

export type DecodeContext = CodecContext;

export interface EncodeContext extends CodecContext {
  readonly traceCompression: TraceCompression;
}

export interface BlockCodec {
  readonly name: string;
  decode(payload: Uint8Array, ctx: DecodeContext, type: number): BlockValue;
  encode(value: BlockValue, ctx: EncodeContext, type: number): Uint8Array;
}

export type CodecTable = ReadonlyMap<number, BlockCodec>;

const NO_EXCLUSIONS: ReadonlySet<number> = new Set();

/**
 * Context for a stream nested one level deeper
 * @throws {NestingTooDeepError} If the new level exceeds `maxDepth`
 */
export function descend<C extends CodecContext>(ctx: C, excluded?: ReadonlySet<number>): C {
  const depth = ctx.depth + 1;
  if (depth > ctx.maxDepth) {
    throw new NestingTooDeepError(ctx.maxDepth, "container");
  }
  return { ...ctx, depth, excluded: excluded ?? ctx.excluded };
}

export function rootContext<C extends Omit<CodecContext, "depth" | "excluded">>(
  base: C
): C & { depth: number; excluded: ReadonlySet<number> } {
  return { ...base, depth: 0, excluded: NO_EXCLUSIONS };
}

/**
 * Error for a codec handed a value of the wrong kind
 */
export function valueMismatch(type: number, expected: BlockValueKind, value: BlockValue): SerializeError {
  return new SerializeError(
    `Block type ${type} expects a '${expected}' value, got '${value.kind}'`
  );
}

// =============================================================================
// HEADER
// =============================================================================

/**
 * Read and validate the 19-byte file header
 * @throws {InvalidHeaderError} On any mismatch with the fixed layout
 */
export function readHeader(bytes: Uint8Array): Header {
  if (bytes.length > 0 && bytes[0] !== HEADER_MAGIC) {
    throw new InvalidHeaderError(
      `Not a SnapGene file: first byte is 0x${(bytes[0] ?? 0).toString(16).padStart(2, "0")}, expected 0x09`,
      "magic"
    );
  }
  if (bytes.length < HEADER_SIZE) {
    throw new InvalidHeaderError(
      `File is ${bytes.length} bytes, shorter than the ${HEADER_SIZE}-byte header`,
      "size"
    );
  }

  const lengthField = readUInt32BE(bytes, 1);
  if (lengthField !== HEADER_LENGTH_FIELD) {
    throw new InvalidHeaderError(
      `Header length field is ${lengthField}, expected ${HEADER_LENGTH_FIELD}`,
      "length"
    );
  }

  const title = decodeAscii(bytes.subarray(5, 13));
  if (title !== HEADER_TITLE) {
    throw new InvalidHeaderError(`Header title is '${title}', expected '${HEADER_TITLE}'`, "title");
  }

  const kindCode = readUInt16BE(bytes, 13);
  const kind = SEQUENCE_KIND_CODES.get(kindCode);
  if (kind === undefined) {
    throw new InvalidHeaderError(`Unknown sequence kind code ${kindCode}`, "sequence-kind");
  }

  return {
    kind,
    exportVersion: readUInt16BE(bytes, 15),
    importVersion: readUInt16BE(bytes, 17),
  };
}

export function writeHeader(writer: ByteWriter, header: Header): void {
  writer
    .uint8(HEADER_MAGIC)
    .uint32(HEADER_LENGTH_FIELD)
    .bytes(encodeAscii(HEADER_TITLE))
    .uint16(SEQUENCE_KIND_TO_CODE[header.kind])
    .uint16(header.exportVersion)
    .uint16(header.importVersion);
}

// =============================================================================
// BLOCK STREAM
// =============================================================================

function readBlockHeader(bytes: Uint8Array, offset: number): { type: number; length: number } {
  const available = bytes.length - offset;
  if (available < BLOCK_HEADER_SIZE) {
    const error = new TruncatedBlockError(
      `Incomplete block header: ${available} of ${BLOCK_HEADER_SIZE} bytes`,
      BLOCK_HEADER_SIZE,
      available
    );
    const type = bytes[offset];
    if (type === undefined) {
      error.offset = offset;
      throw error;
    }
    throw error.withBlockContext(type, offset);
  }
  const type = bytes[offset] ?? 0;
  return { type, length: readUInt32BE(bytes, offset + 1) };
}

/**
 * Decode every block from `start` to the end of `bytes`
 *
 * Offsets attached to errors are positions within `bytes`.
 */
export function decodeBlocks(bytes: Uint8Array, ctx: DecodeContext, start = 0): BlockContainer {
  const blocks = new BlockContainer();
  let offset = start;

  while (offset < bytes.length) {
    const { type, length } = readBlockHeader(bytes, offset);
    const payloadStart = offset + BLOCK_HEADER_SIZE;
    const available = bytes.length - payloadStart;
    if (length > available) {
      throw TruncatedBlockError.forPayload(type, offset, length, available).withBlockContext(type, offset);
    }
    const payload = bytes.subarray(payloadStart, payloadStart + length);

    const codec = ctx.excluded.has(type) ? undefined : ctx.codecs.get(type);
    if (codec === undefined) {
      if (!ctx.excluded.has(type)) {
        ctx.onWarning(`Block type ${type} at offset ${offset} is not decoded; keeping ${length} raw bytes`);
      }
      blocks.append(type, { kind: "raw", bytes: payload.slice() });
    } else {
      try {
        blocks.append(type, codec.decode(payload, ctx, type));
      } catch (error) {
        throw toSnapGeneError(error).withBlockContext(type, offset);
      }
    }

    offset = payloadStart + length;
  }

  return blocks;
}

/**
 * Encode blocks in container order. Raw entries are written verbatim.
 */
export function encodeBlocks(blocks: BlockContainer, ctx: EncodeContext, writer: ByteWriter): void {
  for (const entry of blocks) {
    const offset = writer.size;
    try {
      writer.block(entry.type, encodeValue(entry.type, entry.value, ctx));
    } catch (error) {
      throw toSnapGeneError(error).withBlockContext(entry.type, offset);
    }
  }
}

function encodeValue(type: number, value: BlockValue, ctx: EncodeContext): Uint8Array {
  if (value.kind === "raw") {
    return value.bytes;
  }
  const codec = ctx.codecs.get(type);
  if (codec === undefined) {
    throw new SerializeError(`No codec for block type ${type}; only raw bytes can be written`);
  }
  return codec.encode(value, ctx, type);
}

/**
 * Encode blocks into a standalone stream
 */
export function serializeBlocks(blocks: BlockContainer, ctx: EncodeContext): Uint8Array {
  const writer = new ByteWriter();
  encodeBlocks(blocks, ctx, writer);
  return writer.toUint8Array();
}
