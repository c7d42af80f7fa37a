/**
 * XZ/LZMA compression for nested SnapGene payloads
 *
 * History trees, history node payloads and nested block containers are
 * stored as complete XZ streams. This wraps the native @napi-rs/lzma
 * bindings with the same validation and error shape as the zlib module.
 */

import { xz } from "@napi-rs/lzma";
import { CompressionError } from "../errors";

// XZ stream header magic: FD 37 7A 58 5A 00
const XZ_MAGIC = new Uint8Array([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00]);

// Helper functions (not exported)
function validateCompressedData(compressed: Uint8Array): void {
  if (compressed.length === 0) {
    throw new CompressionError("Compressed data must not be empty", "xz", "decompress");
  }
}

function validateXzFormat(compressed: Uint8Array): void {
  if (!isXz(compressed)) {
    throw new CompressionError(
      "Invalid xz magic bytes - payload may not be xz compressed",
      "xz",
      "decompress",
      0
    );
  }
}

/**
 * Check for the XZ stream header magic
 */
export function isXz(data: Uint8Array): boolean {
  if (data.length < XZ_MAGIC.length) {
    return false;
  }
  return XZ_MAGIC.every((byte, i) => data[i] === byte);
}

/**
 * Decompress a complete XZ stream held in memory
 *
 * @param compressed XZ-compressed payload
 * @returns Decompressed bytes
 * @throws {CompressionError} If the payload is not a valid XZ stream
 */
export function decompress(compressed: Uint8Array): Uint8Array {
  validateCompressedData(compressed);
  validateXzFormat(compressed);

  try {
    return new Uint8Array(xz.decompressSync(compressed));
  } catch (error) {
    throw CompressionError.fromSystemError("xz", "decompress", error, compressed.length);
  }
}

/**
 * Compress bytes into a complete XZ stream
 *
 * @param data Uncompressed bytes
 * @returns XZ-compressed payload
 * @throws {CompressionError} If the native encoder fails
 */
export function compress(data: Uint8Array): Uint8Array {
  try {
    return new Uint8Array(xz.compressSync(data));
  } catch (error) {
    throw CompressionError.fromSystemError("xz", "compress", error, data.length);
  }
}

export const XzCodec = {
  compress,
  decompress,
  isXz,
} as const;
