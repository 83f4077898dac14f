/**
 * Zstandard decompression through the @hpcc-js/wasm-zstd module
 *
 * The WASM module decodes whole frames, so the source drains its input
 * before emitting any output. Loading the module is asynchronous and done
 * once; the loaded codec is then used synchronously.
 */

import { Zstd } from "@hpcc-js/wasm-zstd";
import { CompressionError } from "../errors";
import { concatBytes } from "../io/bytes";
import type { ByteSource } from "../io/sources";
import type { CodecFactory } from "../types";
import { DEFAULT_BUFFER_SIZE } from "../types";

let zstdPromise: Promise<Zstd> | undefined;

/**
 * Load (once) the zstd WASM module
 */
export function loadZstd(): Promise<Zstd> {
  if (zstdPromise === undefined) {
    zstdPromise = Zstd.load().catch((error: unknown) => {
      zstdPromise = undefined;
      throw CompressionError.fromSystemError("zstd", "load", error);
    });
  }
  return zstdPromise;
}

export class ZstdSource implements ByteSource {
  private output: Uint8Array | undefined;
  private offset = 0;

  constructor(
    private readonly inner: ByteSource,
    private readonly zstd: Zstd,
    private readonly bufferSize: number = DEFAULT_BUFFER_SIZE
  ) {}

  read(into: Uint8Array): number {
    if (this.output === undefined) this.output = this.decodeAll();
    const count = Math.min(into.length, this.output.length - this.offset);
    if (count <= 0) return 0;
    into.set(this.output.subarray(this.offset, this.offset + count));
    this.offset += count;
    return count;
  }

  close(): void {
    this.inner.close?.();
  }

  private decodeAll(): Uint8Array {
    const chunks: Uint8Array[] = [];
    for (;;) {
      const chunk = new Uint8Array(this.bufferSize);
      const count = this.inner.read(chunk);
      if (count === 0) break;
      chunks.push(chunk.subarray(0, count));
    }
    const compressed = concatBytes(chunks);
    try {
      return this.zstd.decompress(compressed);
    } catch (error) {
      throw CompressionError.fromSystemError("zstd", "decompress", error, compressed.length);
    }
  }
}

/**
 * Codec factory bound to a loaded zstd module
 */
export function zstdCodec(zstd: Zstd): CodecFactory {
  return (source, bufferSize) => new ZstdSource(source, zstd, bufferSize);
}
