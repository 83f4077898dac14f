/**
 * recstream: incremental record readers for sequencing and instrument files
 *
 * @example
 * ```typescript
 * import { openReader, FileSource } from "recstream";
 *
 * const reader = openReader(FileSource.open("reads.fastq.gz"));
 * for (const record of reader) {
 *   console.log(record);
 * }
 * reader.close();
 * ```
 */

export * from "./compression";
export {
  BamError,
  CompressionError,
  InficonError,
  ParseError,
  RecstreamError,
  SourceError,
  UnsupportedFormatError,
  ValidationError,
} from "./errors";
export type { CompressionFormat, ParseErrorDetails } from "./errors";
export * from "./formats";
export { ReadBuffer } from "./io/read-buffer";
export { BufferSource, ChunkedSource, FileSource, PeekableSource } from "./io/sources";
export type { ByteSource } from "./io/sources";
export { createReader, openReader, openReaderEffect, Reader } from "./reader";
export type { ReaderInput } from "./reader";
export {
  DECODABLE_PARSER_NAMES,
  DEFAULT_BUFFER_SIZE,
  isCompression,
  MAX_BUFFER_SIZE,
  MIN_BUFFER_SIZE,
  NAMED_FILE_KINDS,
  PARSER_NAMES,
  ParserNameSchema,
  ReaderOptionsSchema,
} from "./types";
export type {
  AlignmentRecord,
  AnyRecord,
  CodecFactory,
  DecodableParserName,
  DecompressionCodecs,
  DelimitedRecord,
  FastaRecord,
  FastqRecord,
  FileKind,
  FileType,
  InficonRecord,
  NamedFileKind,
  ParserName,
  ReaderMetadata,
  ReaderOptions,
  RecordByParser,
  RecordFor,
  ReferenceSequence,
} from "./types";
