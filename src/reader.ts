/**
 * Reader facade
 *
 * Turns bytes or a byte source into a pull-based record reader: sniff and
 * unwrap compression, pick a decoder from the explicit parser name or the
 * sniffed type, run its setup and hand out records one at a time.
 *
 * @example
 * ```typescript
 * import { openReader } from "recstream";
 *
 * const reader = openReader(bytes);
 * for (const record of reader) {
 *   console.log(reader.row(record));
 * }
 * ```
 */

import { type } from "arktype";
import { Effect } from "effect";
import { CodecService } from "./compression/service";
import { decompress, GZIP_CODECS, sniff } from "./compression/decompress";
import { parserNameForFileType } from "./compression/detector";
import { RecstreamError, UnsupportedFormatError, ValidationError } from "./errors";
import { ReadBuffer } from "./io/read-buffer";
import { BufferSource } from "./io/sources";
import type { ByteSource } from "./io/sources";
import type { ParserSession } from "./formats/abstract-parser";
import { FORMAT_NAMES, isDecodable, openSession } from "./formats/registry";
import { DEFAULT_BUFFER_SIZE, ReaderOptionsSchema } from "./types";
import type {
  AnyRecord,
  DecodableParserName,
  FileType,
  ReaderMetadata,
  ReaderOptions,
  RecordFor,
} from "./types";

export type ReaderInput = Uint8Array | ByteSource;

/**
 * Pull-based reader over the records of one stream
 */
export class Reader<TRecord extends object = AnyRecord> implements Iterable<TRecord> {
  constructor(
    /** Decoder in use */
    readonly parser: DecodableParserName,
    /** Type of the decoded bytes (inside any compression container) */
    readonly fileType: FileType,
    /** Container that was unwrapped, or null */
    readonly compression: FileType | null,
    private readonly session: ParserSession<TRecord>,
    private readonly source: ByteSource
  ) {}

  /** Field names, in the key order of every record */
  headers(): readonly string[] {
    return this.session.headers;
  }

  metadata(): ReaderMetadata {
    return this.session.metadata;
  }

  /**
   * Next record, or null once the stream is exhausted
   *
   * @throws {ParseError} When the input is malformed; the reader then
   * rethrows the same error on every later call
   */
  next(): TRecord | null {
    return this.session.driver.next();
  }

  /**
   * Next record in iterator-result form
   */
  nextEntry(): IteratorResult<TRecord, undefined> {
    const value = this.next();
    return value === null ? { value: undefined, done: true } : { value, done: false };
  }

  /**
   * Field values of `record` in {@link headers} order
   */
  row(record: TRecord): unknown[] {
    const values = new Map<string, unknown>(Object.entries(record));
    return this.headers().map((field) => values.get(field) ?? null);
  }

  [Symbol.iterator](): Iterator<TRecord, undefined> {
    return { next: () => this.nextEntry() };
  }

  close(): void {
    this.source.close?.();
  }
}

interface ResolvedOptions {
  parser: ReaderOptions["parser"];
  bufferSize: number;
  decompress: boolean;
  codecs: NonNullable<ReaderOptions["codecs"]>;
  onWarning: ReaderOptions["onWarning"];
}

function resolveOptions(options: ReaderOptions): ResolvedOptions {
  const checked = ReaderOptionsSchema({
    ...(options.parser !== undefined && { parser: options.parser }),
    ...(options.bufferSize !== undefined && { bufferSize: options.bufferSize }),
    ...(options.decompress !== undefined && { decompress: options.decompress }),
  });
  if (checked instanceof type.errors) {
    throw new ValidationError(`Invalid reader options: ${checked.summary}`);
  }
  if (options.onWarning !== undefined && typeof options.onWarning !== "function") {
    throw new ValidationError("Invalid reader options: onWarning must be a function");
  }
  return {
    parser: checked.parser,
    bufferSize: checked.bufferSize ?? DEFAULT_BUFFER_SIZE,
    decompress: checked.decompress ?? true,
    codecs: options.codecs ?? GZIP_CODECS,
    onWarning: options.onWarning,
  };
}

function toSource(input: ReaderInput): ByteSource {
  return input instanceof Uint8Array ? new BufferSource(input) : input;
}

function buildReader<K extends DecodableParserName>(
  name: K,
  source: ByteSource,
  fileType: FileType,
  compression: FileType | null,
  options: ResolvedOptions
): Reader<RecordFor<K>> {
  const buffer = new ReadBuffer(source, options.bufferSize, FORMAT_NAMES[name]);
  const session = openSession(name, buffer, options.onWarning !== undefined ? { onWarning: options.onWarning } : {});
  return new Reader(name, fileType, compression, session, source);
}

/**
 * Open a reader, choosing the decoder from `options.parser` or by sniffing
 *
 * @throws {ValidationError} For invalid options
 * @throws {UnsupportedFormatError} When the chosen format has no decoder
 */
export function openReader(input: ReaderInput, options: ReaderOptions = {}): Reader {
  const resolved = resolveOptions(options);
  const source = toSource(input);
  const unwrapped = resolved.decompress
    ? decompress(source, resolved.codecs, resolved.bufferSize)
    : sniff(source);

  const name = resolved.parser ?? parserNameForFileType(unwrapped.fileType);
  if (!isDecodable(name)) {
    throw new UnsupportedFormatError(name);
  }
  return buildReader(name, unwrapped.source, unwrapped.fileType, unwrapped.compression, resolved);
}

/**
 * Open a reader for a known format with records typed accordingly
 *
 * @example
 * ```typescript
 * const reader = createReader("fastq", bytes);
 * const first = reader.next(); // FastqRecord | null
 * ```
 */
export function createReader<K extends DecodableParserName>(
  parser: K,
  input: ReaderInput,
  options: Omit<ReaderOptions, "parser"> = {}
): Reader<RecordFor<K>> {
  const resolved = resolveOptions({ ...options, parser });
  const source = toSource(input);
  const unwrapped = resolved.decompress
    ? decompress(source, resolved.codecs, resolved.bufferSize)
    : sniff(source);
  return buildReader(parser, unwrapped.source, unwrapped.fileType, unwrapped.compression, resolved);
}

/**
 * Open a reader with the codec set provided by {@link CodecService}
 */
export function openReaderEffect(
  input: ReaderInput,
  options: Omit<ReaderOptions, "codecs"> = {}
): Effect.Effect<Reader, RecstreamError, CodecService> {
  return Effect.gen(function* () {
    const service = yield* CodecService;
    return yield* Effect.try({
      try: () => openReader(input, { ...options, codecs: service.codecs }),
      catch: (error) =>
        error instanceof RecstreamError
          ? error
          : new RecstreamError(error instanceof Error ? error.message : String(error), "UNKNOWN_ERROR"),
    });
  });
}
