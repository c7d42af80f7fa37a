/**
 * Effect-based compression service
 *
 * The block codecs are synchronous and call a plain `Compressor`. Code that
 * composes with Effect provides a `CompressionService` layer instead, and
 * `compressorFromService` bridges the two so the Effect entry points in
 * `formats/sgff.ts` decode through whatever layer is in scope.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 *
 * const program = Effect.gen(function* () {
 *   const svc = yield* CompressionService;
 *   return yield* svc.decompress(payload, "xz");
 * });
 *
 * await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 */

import { Cause, Context, Effect, Exit, Layer } from "effect";
import { CompressionError } from "../errors";
import type { CompressionFormat, Compressor } from "../types";
import * as xz from "./xz";
import * as zlib from "./zlib";

// =============================================================================
// SERVICE SHAPE (Interface)
// =============================================================================

/**
 * Shape of the compression service - defines the available operations.
 */
export interface CompressionServiceShape {
  /**
   * Compress data using the specified format
   *
   * @param data - Uncompressed data
   * @param format - Compression format (xz, zlib, none)
   * @returns Effect that produces compressed data
   */
  readonly compress: (
    data: Uint8Array,
    format: CompressionFormat
  ) => Effect.Effect<Uint8Array, CompressionError>;

  /**
   * Decompress data using the specified format
   *
   * @param data - Compressed data
   * @param format - Compression format used to compress the data
   * @returns Effect that produces decompressed data
   */
  readonly decompress: (
    data: Uint8Array,
    format: CompressionFormat
  ) => Effect.Effect<Uint8Array, CompressionError>;
}

// =============================================================================
// SERVICE TAG (Effect 3.x Class-Based Pattern)
// =============================================================================

/**
 * Compression service for Effect-based dependency injection
 */
export class CompressionService extends Context.Tag("snapgene-tlv/CompressionService")<
  CompressionService,
  CompressionServiceShape
>() {
  /**
   * Native xz + fflate zlib layer. No async initialization required.
   */
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(
    CompressionService,
    createNativeService()
  );
}

// =============================================================================
// SERVICE IMPLEMENTATION
// =============================================================================

function createNativeService(): CompressionServiceShape {
  return {
    compress: (data, format) =>
      Effect.try({
        try: () => defaultCompressor.compress(data, format),
        catch: (error) => CompressionError.fromSystemError(format, "compress", error),
      }),

    decompress: (data, format) =>
      Effect.try({
        try: () => defaultCompressor.decompress(data, format),
        catch: (error) => CompressionError.fromSystemError(format, "decompress", error),
      }),
  };
}

/**
 * Synchronous compressor backed by @napi-rs/lzma and fflate
 */
export const defaultCompressor: Compressor = {
  compress(data, format) {
    switch (format) {
      case "xz":
        return xz.compress(data);
      case "zlib":
        return zlib.compress(data);
      case "none":
        return data;
    }
  },
  decompress(data, format) {
    switch (format) {
      case "xz":
        return xz.decompress(data);
      case "zlib":
        return zlib.decompress(data);
      case "none":
        return data;
    }
  },
};

/**
 * Run a service effect synchronously, rethrowing its typed failure
 *
 * `Effect.runSync` would wrap the failure in a FiberFailure; squashing the
 * cause keeps the original CompressionError for the dispatcher to annotate.
 */
function runOrThrow(effect: Effect.Effect<Uint8Array, CompressionError>): Uint8Array {
  const exit = Effect.runSyncExit(effect);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}

/**
 * Adapt a service implementation to the synchronous `Compressor` interface
 */
export function compressorFromService(service: CompressionServiceShape): Compressor {
  return {
    compress: (data, format) => runOrThrow(service.compress(data, format)),
    decompress: (data, format) => runOrThrow(service.decompress(data, format)),
  };
}
