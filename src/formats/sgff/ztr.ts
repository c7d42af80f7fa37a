/**
 * ZTR chromatogram codec (block 18)
 *
 * A trace is an 8-byte magic, a u16 version and a run of chunks. Each chunk
 * is a 4-character type, length-prefixed metadata and length-prefixed data.
 * The first data byte selects the framing: 0x00 is a raw body, 0x02 is a
 * 4-byte little-endian size followed by a zlib stream. Decoding normalises
 * both to the raw form before reading the typed payload.
 */

import {
  InvalidMagicError,
  MalformedBlockError,
  SerializeError,
  TruncatedBlockError,
  UnsupportedTraceCompressionError,
} from "../../errors";
import type { Compressor, TraceCompression, WarningHandler } from "../../types";
import { ByteCursor, bytesEqual, decodeAscii } from "./binary";
import { ByteWriter, concatBytes, encodeAscii } from "./binary-serializer";
import type { BlockCodec } from "./dispatcher";
import { valueMismatch } from "./dispatcher";
import type { ChunkFraming, TextEntry, Trace, TraceChunk, TraceChunkPayload } from "./types";

export const ZTR_MAGIC = new Uint8Array([0xae, 0x5a, 0x54, 0x52, 0x0d, 0x0a, 0x1a, 0x0a]);

export const FRAMING_RAW = 0x00;
export const FRAMING_ZLIB = 0x02;
const ZLIB_SIZE_FIELD = 4;

const SAMPLE_CHANNELS = ["A", "C", "G", "T"] as const;

export interface TraceEncodeOptions {
  compression: TraceCompression;
  compressor: Compressor;
  /** Told when preserve mode has to drop a chunk's zlib framing */
  onWarning?: WarningHandler;
}

// =============================================================================
// FRAMING
// =============================================================================

/**
 * Strip the framing selector, returning the chunk body as if it had been
 * stored raw (leading 0x00 included)
 * @throws {UnsupportedTraceCompressionError} On a selector other than 0x00 or 0x02
 */
export function normalizeChunkData(type: string, data: Uint8Array, compressor: Compressor): Uint8Array {
  const selector = data[0];
  if (selector === undefined || selector === FRAMING_RAW) {
    return data;
  }
  if (selector !== FRAMING_ZLIB) {
    throw new UnsupportedTraceCompressionError(type, selector);
  }
  if (data.length < 1 + ZLIB_SIZE_FIELD) {
    throw new TruncatedBlockError(
      `zlib-framed ${type} chunk is missing its size field`,
      1 + ZLIB_SIZE_FIELD,
      data.length
    );
  }
  const body = compressor.decompress(data.subarray(1 + ZLIB_SIZE_FIELD), "zlib");
  return concatBytes([new Uint8Array([FRAMING_RAW]), body]);
}

/**
 * Wrap a raw chunk (leading 0x00) in zlib framing
 */
export function zlibFrame(raw: Uint8Array, compressor: Compressor): Uint8Array {
  const body = raw.subarray(1);
  const compressed = compressor.compress(body, "zlib");
  const framed = new Uint8Array(1 + ZLIB_SIZE_FIELD + compressed.length);
  framed[0] = FRAMING_ZLIB;
  new DataView(framed.buffer).setUint32(1, body.length, true);
  framed.set(compressed, 1 + ZLIB_SIZE_FIELD);
  return framed;
}

// =============================================================================
// CHUNK PAYLOADS
// =============================================================================

function requireLayout(type: string, ok: boolean, detail: string): void {
  if (!ok) {
    throw new MalformedBlockError(`${type} chunk: ${detail}`);
  }
}

function readTextEntries(body: Uint8Array): TextEntry[] {
  const entries: TextEntry[] = [];
  const fields: string[] = [];
  let start = 0;
  for (let i = 0; i <= body.length; i++) {
    if (i === body.length || body[i] === 0) {
      fields.push(decodeAscii(body.subarray(start, i)));
      start = i + 1;
    }
  }
  for (let i = 0; i + 1 < fields.length; i += 2) {
    const key = fields[i] ?? "";
    if (key === "") break;
    entries.push({ key, value: fields[i + 1] ?? "" });
  }
  return entries;
}

function readUInt16Run(type: string, body: Uint8Array): number[] {
  requireLayout(type, body.length % 2 === 0, `${body.length} sample bytes is not a whole number of u16 values`);
  const cursor = new ByteCursor(body);
  const values: number[] = [];
  while (!cursor.done) {
    values.push(cursor.uint16());
  }
  return values;
}

/**
 * Decode the typed payload of a normalised chunk
 */
export function decodeChunkPayload(type: string, metadata: Uint8Array, raw: Uint8Array): TraceChunkPayload {
  // raw[0] is the framing byte, always 0x00 here
  switch (type) {
    case "BASE":
      return { kind: "bases", calls: decodeAscii(raw.subarray(1)) };

    case "BPOS": {
      requireLayout(type, raw.length >= 4 && (raw.length - 4) % 4 === 0, `${raw.length} bytes is not 4 + 4n`);
      const cursor = new ByteCursor(raw, 4);
      const positions: number[] = [];
      while (!cursor.done) {
        positions.push(cursor.uint32());
      }
      return { kind: "positions", positions };
    }

    case "CNF4":
      return { kind: "confidence", values: Array.from(raw.subarray(1)) };

    case "SMP4": {
      requireLayout(type, raw.length >= 2 && (raw.length - 2) % 8 === 0, `${raw.length} bytes is not 2 + 8n`);
      const samples = readUInt16Run(type, raw.subarray(2));
      const channels: [number[], number[], number[], number[]] = [[], [], [], []];
      samples.forEach((value, i) => channels[i % 4]?.push(value));
      const [a, c, g, t] = channels;
      return { kind: "samples4", a, c, g, t };
    }

    case "SAMP": {
      requireLayout(type, raw.length >= 2, "missing padding byte");
      return {
        kind: "samples",
        channel: decodeAscii(metadata.subarray(0, 1)),
        samples: readUInt16Run(type, raw.subarray(2)),
      };
    }

    case "TEXT":
      return { kind: "text", entries: readTextEntries(raw.subarray(1)) };

    case "CLIP": {
      requireLayout(type, raw.length === 9, `expected 9 bytes, got ${raw.length}`);
      const cursor = new ByteCursor(raw, 1);
      return { kind: "clip", left: cursor.uint32(), right: cursor.uint32() };
    }

    case "COMM":
      return { kind: "comment", text: decodeAscii(raw.subarray(1)) };

    default:
      return { kind: "raw", body: raw.slice(1) };
  }
}

/**
 * Raw encoding of a payload, leading 0x00 included
 */
export function encodeChunkPayload(payload: TraceChunkPayload): Uint8Array {
  const writer = new ByteWriter().uint8(FRAMING_RAW);
  switch (payload.kind) {
    case "bases":
      writer.bytes(encodeAscii(payload.calls));
      break;
    case "positions":
      writer.bytes(new Uint8Array(3));
      payload.positions.forEach((position) => writer.uint32(position));
      break;
    case "confidence":
      payload.values.forEach((value) => writer.uint8(value));
      break;
    case "samples4": {
      const { a, c, g, t } = payload;
      if (c.length !== a.length || g.length !== a.length || t.length !== a.length) {
        throw new SerializeError(
          `SMP4 channels differ in length: A=${a.length} C=${c.length} G=${g.length} T=${t.length}`
        );
      }
      writer.uint8(0);
      for (let i = 0; i < a.length; i++) {
        writer.uint16(a[i] ?? 0).uint16(c[i] ?? 0).uint16(g[i] ?? 0).uint16(t[i] ?? 0);
      }
      break;
    }
    case "samples":
      writer.uint8(0);
      payload.samples.forEach((value) => writer.uint16(value));
      break;
    case "text":
      for (const { key, value } of payload.entries) {
        writer.bytes(encodeAscii(key)).uint8(0).bytes(encodeAscii(value)).uint8(0);
      }
      writer.uint8(0);
      break;
    case "clip":
      writer.uint32(payload.left).uint32(payload.right);
      break;
    case "comment":
      writer.bytes(encodeAscii(payload.text));
      break;
    case "raw":
      writer.bytes(payload.body);
      break;
  }
  return writer.toUint8Array();
}

/**
 * SAMP metadata for a channel: the letter plus three NUL bytes
 */
export function sampleChannelMetadata(channel: string): Uint8Array {
  return concatBytes([encodeAscii(channel.slice(0, 1)), new Uint8Array(3)]);
}

// =============================================================================
// TRACE
// =============================================================================

/**
 * @throws {InvalidMagicError} If the input does not start with the ZTR magic
 * @throws {TruncatedBlockError} If a chunk runs past the end of the input
 */
export function decodeTrace(bytes: Uint8Array, compressor: Compressor): Trace {
  const magic = bytes.subarray(0, ZTR_MAGIC.length);
  if (!bytesEqual(magic, ZTR_MAGIC)) {
    throw new InvalidMagicError(magic.slice());
  }

  const cursor = new ByteCursor(bytes, ZTR_MAGIC.length);
  const version = cursor.uint16();
  const chunks: TraceChunk[] = [];

  while (!cursor.done) {
    const type = decodeAscii(cursor.bytesOf(4));
    const metadata = cursor.bytesOf(cursor.uint32()).slice();
    const data = cursor.bytesOf(cursor.uint32()).slice();

    const raw = normalizeChunkData(type, data, compressor);
    const payload = decodeChunkPayload(type, metadata, raw);
    const framing: ChunkFraming = { data, canonical: encodeChunkPayload(payload) };
    chunks.push({ type, metadata, payload, framing });
  }

  return { version, chunks };
}

function frameChunk(chunk: TraceChunk, options: TraceEncodeOptions): Uint8Array {
  const canonical = encodeChunkPayload(chunk.payload);
  switch (options.compression) {
    case "raw":
      return canonical;
    case "zlib":
      return zlibFrame(canonical, options.compressor);
    case "preserve":
      if (chunk.framing === undefined) {
        return canonical;
      }
      if (bytesEqual(canonical, chunk.framing.canonical)) {
        return chunk.framing.data;
      }
      if (chunk.framing.data[0] === FRAMING_ZLIB) {
        options.onWarning?.(`Trace chunk ${chunk.type} was edited; writing it without its original zlib framing`);
      }
      return canonical;
  }
}

export function encodeTrace(trace: Trace, options: TraceEncodeOptions): Uint8Array {
  const writer = new ByteWriter().bytes(ZTR_MAGIC).uint16(trace.version);
  for (const chunk of trace.chunks) {
    const type = encodeAscii(chunk.type);
    if (type.length !== 4) {
      throw new SerializeError(`Trace chunk type must be 4 characters, got '${chunk.type}'`);
    }
    writer.bytes(type).lengthPrefixed(chunk.metadata).lengthPrefixed(frameChunk(chunk, options));
  }
  return writer.toUint8Array();
}

export const traceCodec: BlockCodec = {
  name: "trace",
  decode: (payload, ctx) => ({ kind: "trace", trace: decodeTrace(payload, ctx.compressor) }),
  encode: (value, ctx, type) => {
    if (value.kind !== "trace") {
      throw valueMismatch(type, "trace", value);
    }
    return encodeTrace(value.trace, {
      compression: ctx.traceCompression,
      compressor: ctx.compressor,
      onWarning: ctx.onWarning,
    });
  },
};
