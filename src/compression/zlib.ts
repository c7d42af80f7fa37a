/**
 * zlib compression for chromatogram trace chunks
 *
 * ZTR chunks may carry their body zlib-compressed (header 78 xx, deflate
 * data, Adler-32 trailer). fflate handles both directions synchronously.
 */

import { unzlibSync, zlibSync } from "fflate";
import { CompressionError } from "../errors";

export type ZlibLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

const DEFAULT_LEVEL: ZlibLevel = 6;

/**
 * Inflate a zlib stream
 *
 * @param compressed zlib-wrapped deflate data
 * @returns Decompressed bytes
 * @throws {CompressionError} If the stream is corrupt or truncated
 */
export function decompress(compressed: Uint8Array): Uint8Array {
  if (compressed.length === 0) {
    throw new CompressionError("Compressed data must not be empty", "zlib", "decompress");
  }

  try {
    return unzlibSync(compressed);
  } catch (error) {
    throw CompressionError.fromSystemError("zlib", "decompress", error, compressed.length);
  }
}

/**
 * Deflate bytes into a zlib stream
 *
 * @param data Uncompressed bytes
 * @param level Compression level (default 6)
 * @throws {CompressionError} If compression fails
 */
export function compress(data: Uint8Array, level: ZlibLevel = DEFAULT_LEVEL): Uint8Array {
  try {
    return zlibSync(data, { level });
  } catch (error) {
    throw CompressionError.fromSystemError("zlib", "compress", error, data.length);
  }
}

export const ZlibCodec = {
  compress,
  decompress,
} as const;
