/**
 * Tests for streaming gzip decompression and container unwrapping
 */

import { gzipSync } from "fflate";
import { describe, expect, test } from "vitest";
import { decompress, sniff } from "../../src/compression/decompress";
import { GzipSource } from "../../src/compression/gzip";
import { CompressionError } from "../../src/errors";
import { BufferSource, ChunkedSource } from "../../src/io/sources";
import type { ByteSource } from "../../src/io/sources";
import { concat } from "../utils/builders";
import { enc, thrown } from "../utils/records";

function drain(source: ByteSource, size = 7): string {
  const parts: Uint8Array[] = [];
  const chunk = new Uint8Array(size);
  for (let count = source.read(chunk); count > 0; count = source.read(chunk)) {
    parts.push(chunk.slice(0, count));
  }
  return new TextDecoder().decode(concat(...parts));
}

const TEXT = "@read1\nACGT\n+\nIIII\n".repeat(50);

describe("GzipSource", () => {
  test("inflates a compressed stream", () => {
    const source = new GzipSource(new BufferSource(gzipSync(enc(TEXT))), 1024);
    expect(drain(source)).toBe(TEXT);
  });

  test("inflates input arriving one byte at a time", () => {
    const source = new GzipSource(ChunkedSource.of(gzipSync(enc(TEXT)), 1), 1);
    expect(drain(source, 3)).toBe(TEXT);
  });

  test("decodes concatenated members as one stream", () => {
    const joined = concat(gzipSync(enc("first part\n")), gzipSync(enc("second part\n")));
    expect(drain(new GzipSource(new BufferSource(joined)))).toBe("first part\nsecond part\n");
  });

  test("reports truncated input as a compression error", () => {
    const compressed = gzipSync(enc(TEXT));
    const truncated = compressed.subarray(0, Math.floor(compressed.length / 2));
    const error = thrown(() => drain(new GzipSource(new BufferSource(truncated))));
    expect(error).toBeInstanceOf(CompressionError);
    if (error instanceof CompressionError) {
      expect(error.format).toBe("gzip");
      expect(error.operation).toBe("decompress");
      expect(error.code).toBe("COMPRESSION_ERROR");
    }
  });
});

describe("decompress", () => {
  test("unwraps gzip and classifies the contents", () => {
    const unwrapped = decompress(new BufferSource(gzipSync(enc(TEXT))));
    expect(unwrapped.compression).toEqual({ kind: "gzip" });
    expect(unwrapped.fileType).toEqual({ kind: "fastq" });
    expect(drain(unwrapped.source)).toBe(TEXT);
  });

  test("passes uncompressed input through untouched", () => {
    const unwrapped = decompress(ChunkedSource.of(enc(">s\nAC\n"), 2));
    expect(unwrapped.compression).toBeNull();
    expect(unwrapped.fileType).toEqual({ kind: "fasta" });
    expect(drain(unwrapped.source)).toBe(">s\nAC\n");
  });

  test("leaves containers without a codec wrapped", () => {
    const bzip = enc("BZh91AY&SY");
    const unwrapped = decompress(new BufferSource(bzip));
    expect(unwrapped.fileType).toEqual({ kind: "bzip" });
    expect(unwrapped.compression).toBeNull();
    expect(drain(unwrapped.source)).toBe("BZh91AY&SY");
  });

  test("an empty codec set leaves gzip wrapped", () => {
    const unwrapped = decompress(new BufferSource(gzipSync(enc(TEXT))), {});
    expect(unwrapped.fileType).toEqual({ kind: "gzip" });
    expect(unwrapped.compression).toBeNull();
  });

  test("sniff classifies without unwrapping", () => {
    const sniffed = sniff(new BufferSource(gzipSync(enc(TEXT))));
    expect(sniffed.fileType).toEqual({ kind: "gzip" });
    expect(sniffed.compression).toBeNull();
  });
});
