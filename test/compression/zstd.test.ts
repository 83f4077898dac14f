/**
 * Tests for zstd decompression and the codec service layers
 */

import { Zstd } from "@hpcc-js/wasm-zstd";
import { Effect, Either } from "effect";
import { gzipSync } from "fflate";
import { beforeAll, describe, expect, test } from "vitest";
import { decompress } from "../../src/compression/decompress";
import { CodecService, loadCodecsWithZstd } from "../../src/compression/service";
import { loadZstd, ZstdSource, zstdCodec } from "../../src/compression/zstd";
import { CompressionError } from "../../src/errors";
import { BufferSource, ChunkedSource } from "../../src/io/sources";
import { enc } from "../utils/records";

const TEXT = ">chr1 test\nACGTACGTAC\nGTACGT\n".repeat(20);

let zstd: Zstd;

beforeAll(async () => {
  zstd = await loadZstd();
});

function drain(source: { read(into: Uint8Array): number }): string {
  const parts: number[] = [];
  const chunk = new Uint8Array(64);
  for (let count = source.read(chunk); count > 0; count = source.read(chunk)) {
    parts.push(...chunk.subarray(0, count));
  }
  return new TextDecoder().decode(Uint8Array.from(parts));
}

describe("ZstdSource", () => {
  test("loads the module once", async () => {
    expect(await loadZstd()).toBe(zstd);
  });

  test("decodes a frame fed in small chunks", () => {
    const compressed = zstd.compress(enc(TEXT));
    expect(drain(new ZstdSource(ChunkedSource.of(compressed, 5), zstd, 16))).toBe(TEXT);
  });

  test("decompress unwraps zstd when the codec is supplied", () => {
    const compressed = zstd.compress(enc(TEXT));
    const unwrapped = decompress(new BufferSource(compressed), { zstd: zstdCodec(zstd) });
    expect(unwrapped.compression).toEqual({ kind: "zstd" });
    expect(unwrapped.fileType).toEqual({ kind: "fasta" });
  });
});

describe("CodecService", () => {
  test("Live decodes gzip but leaves zstd wrapped", async () => {
    const program = Effect.gen(function* () {
      const service = yield* CodecService;
      const gzipped = yield* service.decompress(new BufferSource(gzipSync(enc(TEXT))));
      const zstded = yield* service.decompress(new BufferSource(zstd.compress(enc(TEXT))));
      return [gzipped.fileType, zstded.fileType, zstded.compression];
    });

    const result = await Effect.runPromise(program.pipe(Effect.provide(CodecService.Live)));
    expect(result).toEqual([{ kind: "fasta" }, { kind: "zstd" }, null]);
  });

  test("WithZstd decodes zstd containers", async () => {
    const program = Effect.gen(function* () {
      const service = yield* CodecService;
      return yield* service.decompress(new BufferSource(zstd.compress(enc(TEXT))));
    });

    const unwrapped = await Effect.runPromise(program.pipe(Effect.provide(CodecService.WithZstd)));
    expect(unwrapped.compression).toEqual({ kind: "zstd" });
    expect(drain(unwrapped.source)).toBe(TEXT);
  });

  test("decode failures surface in the error channel", async () => {
    const compressed = gzipSync(enc(TEXT));
    const truncated = compressed.subarray(0, Math.floor(compressed.length / 2));
    const program = Effect.gen(function* () {
      const service = yield* CodecService;
      const unwrapped = yield* service.decompress(new BufferSource(truncated), 1024);
      return unwrapped.fileType;
    });

    const result = await Effect.runPromise(Effect.either(program).pipe(Effect.provide(CodecService.Live)));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(CompressionError);
    }
  });

  test("loadCodecsWithZstd covers gzip and zstd", async () => {
    const codecs = await loadCodecsWithZstd();
    expect(Object.keys(codecs).sort()).toEqual(["gzip", "zstd"]);
  });
});
