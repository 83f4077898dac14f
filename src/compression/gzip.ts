/**
 * Streaming gzip decompression
 *
 * Wraps a compressed byte source and inflates it chunk by chunk with
 * fflate's `Gunzip`. Concatenated members (including BGZF blocks) decode as
 * one continuous stream.
 */

import { Gunzip } from "fflate";
import { CompressionError } from "../errors";
import type { ByteSource } from "../io/sources";
import { DEFAULT_BUFFER_SIZE } from "../types";

export class GzipSource implements ByteSource {
  private readonly inflater: Gunzip;
  private readonly pending: Uint8Array[] = [];
  private pendingOffset = 0;
  private readonly scratch: Uint8Array;
  private inputDone = false;
  private bytesIn = 0;

  constructor(
    private readonly inner: ByteSource,
    bufferSize: number = DEFAULT_BUFFER_SIZE
  ) {
    this.scratch = new Uint8Array(bufferSize);
    this.inflater = new Gunzip((chunk) => {
      if (chunk.length > 0) this.pending.push(chunk.slice());
    });
  }

  read(into: Uint8Array): number {
    if (into.length === 0) return 0;
    while (this.pending.length === 0) {
      if (this.inputDone) return 0;
      this.pump();
    }

    let written = 0;
    while (written < into.length && this.pending.length > 0) {
      const head = this.pending[0];
      if (head === undefined) break;
      const count = Math.min(into.length - written, head.length - this.pendingOffset);
      into.set(head.subarray(this.pendingOffset, this.pendingOffset + count), written);
      written += count;
      this.pendingOffset += count;
      if (this.pendingOffset === head.length) {
        this.pending.shift();
        this.pendingOffset = 0;
      }
    }
    return written;
  }

  close(): void {
    this.inner.close?.();
  }

  private pump(): void {
    const count = this.inner.read(this.scratch);
    try {
      if (count === 0) {
        this.inputDone = true;
        this.inflater.push(new Uint8Array(0), true);
      } else {
        this.bytesIn += count;
        this.inflater.push(this.scratch.slice(0, count));
      }
    } catch (error) {
      throw CompressionError.fromSystemError("gzip", "decompress", error, this.bytesIn);
    }
  }
}

/**
 * Codec factory for {@link DecompressionCodecs}
 */
export function gzipSource(source: ByteSource, bufferSize: number): ByteSource {
  return new GzipSource(source, bufferSize);
}
