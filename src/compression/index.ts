/**
 * Compression backends for SnapGene payloads
 *
 * XZ streams wrap nested containers and history markup; zlib wraps trace
 * chunk bodies.
 */

export { XzCodec, isXz } from "./xz";
export { ZlibCodec } from "./zlib";
export {
  CompressionService,
  compressorFromService,
  defaultCompressor,
} from "./service";
export type { CompressionServiceShape } from "./service";
export type { CompressionFormat, Compressor } from "../types";
export { CompressionError } from "../errors";
