/**
 * Effect service for the decompression codec set
 *
 * ### `CodecService.Live` (gzip only)
 * - Synchronous, nothing to load
 * - zstd containers are classified but not decoded
 *
 * ### `CodecService.WithZstd` (gzip + zstd)
 * - Loads the @hpcc-js/wasm-zstd module when the layer is built
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { CodecService, openReaderEffect } from "recstream";
 *
 * const reader = await Effect.runPromise(
 *   openReaderEffect(bytes).pipe(Effect.provide(CodecService.WithZstd))
 * );
 * ```
 *
 * @module compression/service
 */

import { Context, Effect, Layer } from "effect";
import { CompressionError, RecstreamError } from "../errors";
import type { ByteSource } from "../io/sources";
import type { DecompressionCodecs } from "../types";
import { DEFAULT_BUFFER_SIZE } from "../types";
import { decompress, GZIP_CODECS } from "./decompress";
import type { Decompressed } from "./decompress";
import { loadZstd, zstdCodec } from "./zstd";

export interface CodecServiceShape {
  readonly codecs: DecompressionCodecs;

  /**
   * Classify a source and unwrap one compression layer
   */
  readonly decompress: (
    source: ByteSource,
    bufferSize?: number
  ) => Effect.Effect<Decompressed, RecstreamError>;
}

function createService(codecs: DecompressionCodecs): CodecServiceShape {
  return {
    codecs,
    decompress: (source, bufferSize = DEFAULT_BUFFER_SIZE) =>
      Effect.try({
        try: () => decompress(source, codecs, bufferSize),
        catch: (error) =>
          error instanceof RecstreamError
            ? error
            : new RecstreamError(error instanceof Error ? error.message : String(error), "UNKNOWN_ERROR"),
      }),
  };
}

/**
 * Load zstd and return a codec set covering gzip and zstd
 */
export async function loadCodecsWithZstd(): Promise<DecompressionCodecs> {
  const zstd = await loadZstd();
  return { ...GZIP_CODECS, zstd: zstdCodec(zstd) };
}

export class CodecService extends Context.Tag("recstream/CodecService")<CodecService, CodecServiceShape>() {
  static readonly Live: Layer.Layer<CodecService> = Layer.succeed(CodecService, createService(GZIP_CODECS));

  static readonly WithZstd: Layer.Layer<CodecService, CompressionError> = Layer.effect(
    CodecService,
    Effect.gen(function* () {
      const zstd = yield* Effect.tryPromise({
        try: () => loadZstd(),
        catch: (error) =>
          error instanceof CompressionError ? error : CompressionError.fromSystemError("zstd", "load", error),
      });
      return createService({ ...GZIP_CODECS, zstd: zstdCodec(zstd) });
    })
  );
}
