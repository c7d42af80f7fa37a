/**
 * Binary serialization utilities for SnapGene container writing
 *
 * Mirror image of binary.ts: big-endian integers, single-byte text and a
 * growable writer that the block codecs append to.
 */

import { SerializeError } from "../../errors";

const INITIAL_CAPACITY = 256;
const utf8Encoder = new TextEncoder();

function assertRange(value: number, max: number, what: string): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new SerializeError(`${what} value out of range: ${value} (expected 0-${max})`);
  }
}

/**
 * Encode a string one byte per character
 * @throws {SerializeError} If a character does not fit in a single byte
 */
export function encodeAscii(text: string): Uint8Array {
  const bytes = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code > 0xff) {
      throw new SerializeError(
        `Character '${text[i]}' at position ${i} cannot be stored as a single byte`
      );
    }
    bytes[i] = code;
  }
  return bytes;
}

/**
 * Encode markup text as UTF-8
 */
export function encodeUtf8(text: string): Uint8Array {
  return utf8Encoder.encode(text);
}

/**
 * Concatenate byte arrays into one buffer
 */
export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

/**
 * Growable big-endian byte writer
 */
export class ByteWriter {
  private buffer = new Uint8Array(INITIAL_CAPACITY);
  private view = new DataView(this.buffer.buffer);
  private length = 0;

  get size(): number {
    return this.length;
  }

  private reserve(extra: number): void {
    const needed = this.length + extra;
    if (needed <= this.buffer.length) {
      return;
    }
    let capacity = this.buffer.length;
    while (capacity < needed) {
      capacity *= 2;
    }
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.length));
    this.buffer = next;
    this.view = new DataView(next.buffer);
  }

  uint8(value: number): this {
    assertRange(value, 0xff, "uint8");
    this.reserve(1);
    this.view.setUint8(this.length, value);
    this.length += 1;
    return this;
  }

  uint16(value: number): this {
    assertRange(value, 0xffff, "uint16");
    this.reserve(2);
    this.view.setUint16(this.length, value, false);
    this.length += 2;
    return this;
  }

  uint32(value: number): this {
    assertRange(value, 0xffffffff, "uint32");
    this.reserve(4);
    this.view.setUint32(this.length, value, false);
    this.length += 4;
    return this;
  }

  bytes(value: Uint8Array): this {
    this.reserve(value.length);
    this.buffer.set(value, this.length);
    this.length += value.length;
    return this;
  }

  /** Write a 4-byte length prefix followed by the payload */
  lengthPrefixed(value: Uint8Array): this {
    return this.uint32(value.length).bytes(value);
  }

  /** Write one TLV record: type byte, 4-byte length, payload */
  block(type: number, payload: Uint8Array): this {
    return this.uint8(type).lengthPrefixed(payload);
  }

  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }
}
