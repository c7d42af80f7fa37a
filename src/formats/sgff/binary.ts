/**
 * Binary data parsing utilities for SnapGene containers
 *
 * Every integer in the container is big-endian. Reads are bounds-checked
 * and fail with TruncatedBlockError so a short stream is reported with the
 * byte counts that were expected.
 */

import { MalformedBlockError, TruncatedBlockError } from "../../errors";

const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function ensureAvailable(bytes: Uint8Array, offset: number, length: number, what: string): void {
  if (offset < 0 || offset + length > bytes.length) {
    throw new TruncatedBlockError(
      `Cannot read ${what} at offset ${offset}: need ${length} bytes, have ${Math.max(0, bytes.length - offset)}`,
      length,
      Math.max(0, bytes.length - offset)
    );
  }
}

/**
 * Read an 8-bit unsigned integer
 * @throws {TruncatedBlockError} If offset is out of bounds
 */
export function readUInt8(bytes: Uint8Array, offset: number): number {
  ensureAvailable(bytes, offset, 1, "uint8");
  return viewOf(bytes).getUint8(offset);
}

/**
 * Read a 16-bit unsigned integer in big-endian format
 * @throws {TruncatedBlockError} If offset is out of bounds
 */
export function readUInt16BE(bytes: Uint8Array, offset: number): number {
  ensureAvailable(bytes, offset, 2, "uint16");
  return viewOf(bytes).getUint16(offset, false);
}

/**
 * Read a 32-bit unsigned integer in big-endian format
 * @throws {TruncatedBlockError} If offset is out of bounds
 */
export function readUInt32BE(bytes: Uint8Array, offset: number): number {
  ensureAvailable(bytes, offset, 4, "uint32");
  return viewOf(bytes).getUint32(offset, false);
}

/**
 * Slice `length` bytes starting at `offset` without copying
 * @throws {TruncatedBlockError} If the range runs past the end
 */
export function readBytes(bytes: Uint8Array, offset: number, length: number): Uint8Array {
  ensureAvailable(bytes, offset, length, `${length} bytes`);
  return bytes.subarray(offset, offset + length);
}

/**
 * Decode bytes one character per byte (0x00-0xFF). Sequence and trace
 * alphabets are single-byte, and this mapping is exactly reversible.
 */
export function decodeAscii(bytes: Uint8Array): string {
  let result = "";
  const CHUNK = 8192;
  for (let i = 0; i < bytes.length; i += CHUNK) {
    result += String.fromCharCode(...bytes.subarray(i, i + CHUNK));
  }
  return result;
}

/**
 * Decode strict UTF-8 markup
 * @throws {MalformedBlockError} If the bytes are not valid UTF-8
 */
export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (error) {
    throw new MalformedBlockError(
      "Markup block is not valid UTF-8",
      error instanceof Error ? error.message : String(error)
    );
  }
}

/**
 * Byte-wise equality
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Sequential reader over a byte buffer
 *
 * Used by the codecs whose bodies are a run of fields (history entries,
 * trace chunks) rather than a fixed layout.
 */
export class ByteCursor {
  private position: number;

  constructor(
    private readonly bytes: Uint8Array,
    start = 0
  ) {
    this.position = start;
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.bytes.length - this.position;
  }

  get done(): boolean {
    return this.position >= this.bytes.length;
  }

  uint8(): number {
    const value = readUInt8(this.bytes, this.position);
    this.position += 1;
    return value;
  }

  uint16(): number {
    const value = readUInt16BE(this.bytes, this.position);
    this.position += 2;
    return value;
  }

  uint32(): number {
    const value = readUInt32BE(this.bytes, this.position);
    this.position += 4;
    return value;
  }

  bytesOf(length: number): Uint8Array {
    const value = readBytes(this.bytes, this.position, length);
    this.position += length;
    return value;
  }

  skip(length: number): void {
    this.bytesOf(length);
  }

  rest(): Uint8Array {
    const value = this.bytes.subarray(this.position);
    this.position = this.bytes.length;
    return value;
  }
}
