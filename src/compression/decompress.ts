/**
 * Sniffing and unwrapping of compression containers
 */

import { PeekableSource } from "../io/sources";
import type { ByteSource } from "../io/sources";
import { DEFAULT_BUFFER_SIZE, isCompression } from "../types";
import type { DecompressionCodecs, FileType } from "../types";
import { classify } from "./detector";
import { gzipSource } from "./gzip";

/** Leading bytes examined when classifying a stream */
export const SNIFF_LENGTH = 8192;

/** Codec set available without loading anything: gzip only */
export const GZIP_CODECS: DecompressionCodecs = { gzip: gzipSource };

export interface Decompressed {
  /** Source yielding the (possibly decompressed) bytes, prefix included */
  readonly source: ByteSource;
  /** Type of the bytes `source` yields */
  readonly fileType: FileType;
  /** Container that was unwrapped, or null */
  readonly compression: FileType | null;
}

/**
 * Classify a source and unwrap one compression layer when a codec exists
 *
 * A container without a codec (bzip, lzma, or zstd before the WASM module is
 * loaded) comes back classified as the container with `compression: null`.
 *
 * @example
 * ```typescript
 * const { source, fileType, compression } = decompress(new BufferSource(gzipped));
 * // fileType: { kind: "fastq" }, compression: { kind: "gzip" }
 * ```
 */
export function decompress(
  source: ByteSource,
  codecs: DecompressionCodecs = GZIP_CODECS,
  bufferSize: number = DEFAULT_BUFFER_SIZE
): Decompressed {
  const outer = new PeekableSource(source);
  const fileType = classify(outer.peek(SNIFF_LENGTH));
  if (!isCompression(fileType)) return { source: outer, fileType, compression: null };

  const codec = codecs[fileType.kind];
  if (codec === undefined) return { source: outer, fileType, compression: null };

  const inner = new PeekableSource(codec(outer, bufferSize));
  return { source: inner, fileType: classify(inner.peek(SNIFF_LENGTH)), compression: fileType };
}

/**
 * Classify a source without unwrapping anything
 */
export function sniff(source: ByteSource): Decompressed {
  const outer = new PeekableSource(source);
  return { source: outer, fileType: classify(outer.peek(SNIFF_LENGTH)), compression: null };
}
