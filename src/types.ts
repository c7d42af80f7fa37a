/**
 * Core option and result types for the SnapGene codec
 *
 * Options are plain interfaces with documented defaults. Their scalar fields
 * are checked with arktype schemas before a parser or writer is built, so a
 * bad depth limit fails up front instead of halfway through a nested stream.
 */

import { type } from "arktype";
import { ValidationError } from "./errors";
import type { SnapGeneError } from "./errors";

/**
 * Compression formats that appear inside SnapGene files
 *
 * `xz` wraps nested containers and history markup, `zlib` wraps trace
 * chunk bodies, and `none` is passthrough.
 */
export type CompressionFormat = "xz" | "zlib" | "none";

/**
 * Synchronous compressor the block codecs call into
 *
 * The default implementation is backed by @napi-rs/lzma and fflate; the
 * Effect entry points adapt a `CompressionService` to this shape.
 */
export interface Compressor {
  compress(data: Uint8Array, format: CompressionFormat): Uint8Array;
  decompress(data: Uint8Array, format: CompressionFormat): Uint8Array;
}

/** Advisory callback for recoverable conditions */
export type WarningHandler = (message: string) => void;

/**
 * How trace chunk bodies are framed on write
 *
 * - `preserve`: re-emit a chunk's original framing when its content is unchanged,
 *   otherwise write it raw
 * - `raw`: always write the uncompressed body
 * - `zlib`: always zlib-compress the body
 */
export type TraceCompression = "preserve" | "raw" | "zlib";

export interface SnapGeneParserOptions {
  /** Deepest allowed chain of nested containers (default 8) */
  maxDepth?: number;
  /** Deepest allowed history tree (default 4096) */
  maxHistoryDepth?: number;
  /** Called for unknown block types and duplicate history ids */
  onWarning?: WarningHandler;
  /** Override the xz/zlib backend */
  compressor?: Compressor;
}

export interface SnapGeneWriterOptions {
  /** Trace chunk framing (default "preserve") */
  traceCompression?: TraceCompression;
  /** Deepest allowed chain of nested containers (default 8) */
  maxDepth?: number;
  /** Called when preserve mode writes an edited zlib-framed trace chunk raw */
  onWarning?: WarningHandler;
  compressor?: Compressor;
}

/**
 * Result of a non-throwing parse
 */
export type ParseResult<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: SnapGeneError };

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

export const DepthLimitSchema = type("number.integer>=1");

export const ParserOptionsSchema = type({
  "maxDepth?": DepthLimitSchema,
  "maxHistoryDepth?": DepthLimitSchema,
});

export const WriterOptionsSchema = type({
  "traceCompression?": '"preserve"|"raw"|"zlib"',
  "maxDepth?": DepthLimitSchema,
});

/**
 * Validate the scalar parser options
 * @throws {ValidationError} If a limit is not a positive integer
 */
export function validateParserOptions(options: SnapGeneParserOptions): void {
  // Unlisted keys (callbacks, compressor) pass through untouched
  const result = ParserOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid SnapGene parser options: ${result.summary}`);
  }
}

/**
 * Validate the scalar writer options
 * @throws {ValidationError} If the framing mode or depth limit is invalid
 */
export function validateWriterOptions(options: SnapGeneWriterOptions): void {
  const result = WriterOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid SnapGene writer options: ${result.summary}`);
  }
}
