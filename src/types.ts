/**
 * Core type definitions for recstream
 *
 * Record shapes produced by each decoder, the file type model used by
 * sniffing, and reader options together with their runtime schema.
 */

import { type } from "arktype";
import type { CompressionFormat } from "./errors";
import type { ByteSource } from "./io/sources";

// =============================================================================
// RECORDS
// =============================================================================

/**
 * FASTA record: header text after `>` and the sequence with line breaks removed
 */
export interface FastaRecord {
  readonly id: string;
  readonly sequence: string;
}

/**
 * FASTQ record
 */
export interface FastqRecord {
  readonly id: string;
  readonly sequence: string;
  readonly quality: string;
}

/**
 * Alignment record shared by the SAM and BAM decoders
 *
 * Positions are 0-based; `null` marks an unavailable position or mapping
 * quality. Missing names, CIGAR strings, sequences and qualities are "".
 */
export interface AlignmentRecord {
  readonly queryName: string;
  readonly flag: number;
  readonly refName: string;
  readonly pos: number | null;
  readonly mapq: number | null;
  readonly cigar: string;
  readonly rnext: string;
  readonly pnext: number | null;
  readonly tlen: number;
  readonly seq: string;
  readonly qual: string;
  /** Optional fields joined with `|` (SAM only; BAM leaves tags undecoded) */
  readonly extra: string;
}

/**
 * One intensity reading from an Inficon Hapsite mass spectrometer
 */
export interface InficonRecord {
  /** Retention time in minutes */
  readonly time: number;
  readonly mz: number;
  readonly intensity: number;
}

/**
 * Row of a delimited text file keyed by the header row's column names
 */
export type DelimitedRecord = Readonly<Record<string, string>>;

// =============================================================================
// FILE TYPES
// =============================================================================

export const NAMED_FILE_KINDS = [
  "gzip",
  "bzip",
  "lzma",
  "zstd",
  "agilent-chemstation-fid",
  "agilent-chemstation-ms",
  "agilent-chemstation-mwd",
  "agilent-chemstation-uv",
  "bam",
  "bruker-baf",
  "bruker-msms",
  "facs",
  "fasta",
  "fastq",
  "hdf5",
  "inficon-hapsite",
  "las",
  "mzxml",
  "netcdf",
  "png",
  "sam",
  "scf",
  "thermo-cf",
  "thermo-dxf",
  "thermo-raw",
  "waters-autospec",
  "ztr",
] as const;

export type NamedFileKind = (typeof NAMED_FILE_KINDS)[number];

/**
 * Classification of a stream, decided once from its leading bytes
 */
export type FileType =
  | { readonly kind: NamedFileKind }
  | { readonly kind: "delimited-text"; readonly delimiter: number }
  | { readonly kind: "unknown" };

export type FileKind = FileType["kind"];

const COMPRESSION_KINDS: ReadonlySet<string> = new Set<CompressionFormat>(["gzip", "bzip", "lzma", "zstd"]);

export function isCompression(fileType: FileType): fileType is { readonly kind: CompressionFormat } {
  return COMPRESSION_KINDS.has(fileType.kind);
}

// =============================================================================
// PARSER NAMES
// =============================================================================

/** Parser names that have a decoder */
export const DECODABLE_PARSER_NAMES = ["fasta", "fastq", "sam", "bam", "inficon", "csv", "tsv"] as const;

export type DecodableParserName = (typeof DECODABLE_PARSER_NAMES)[number];

/** Every parser name the format tables know about */
export const PARSER_NAMES = [
  "chemstation_fid",
  "chemstation_ms",
  "chemstation_mwd",
  "chemstation_uv",
  "bam",
  "csv",
  "fcs",
  "fasta",
  "fastq",
  "inficon",
  "png",
  "sam",
  "thermo_cf",
  "thermo_dxf",
  "tsv",
] as const;

export type ParserName = (typeof PARSER_NAMES)[number];

export interface RecordByParser {
  fasta: FastaRecord;
  fastq: FastqRecord;
  sam: AlignmentRecord;
  bam: AlignmentRecord;
  inficon: InficonRecord;
  csv: DelimitedRecord;
  tsv: DelimitedRecord;
}

export type RecordFor<K extends DecodableParserName> = RecordByParser[K];

export type AnyRecord = RecordByParser[DecodableParserName];

// =============================================================================
// READER OPTIONS
// =============================================================================

/**
 * Wraps a compressed source in one that yields the decompressed bytes
 */
export type CodecFactory = (source: ByteSource, bufferSize: number) => ByteSource;

export type DecompressionCodecs = Readonly<Partial<Record<CompressionFormat, CodecFactory>>>;

export interface ReaderOptions {
  /** Explicit decoder; the stream is sniffed when omitted */
  parser?: ParserName;
  /** Refill chunk size in bytes */
  bufferSize?: number;
  /** Unwrap a compression container before decoding (default true) */
  decompress?: boolean;
  /** Available decompressors (default: gzip only) */
  codecs?: DecompressionCodecs;
  /** Sink for non-fatal oddities in the input */
  onWarning?: (message: string) => void;
}

export interface ReferenceSequence {
  readonly name: string;
  readonly length: number;
}

/**
 * Header information a decoder picked up during setup
 */
export interface ReaderMetadata {
  readonly header?: string;
  readonly references?: readonly ReferenceSequence[];
}

export const MIN_BUFFER_SIZE = 1024;
export const MAX_BUFFER_SIZE = 67_108_864;
export const DEFAULT_BUFFER_SIZE = 64 * 1024;

export const ParserNameSchema = type(
  "'chemstation_fid'|'chemstation_ms'|'chemstation_mwd'|'chemstation_uv'|'bam'|'csv'|'fcs'|'fasta'|'fastq'|'inficon'|'png'|'sam'|'thermo_cf'|'thermo_dxf'|'tsv'"
);

/**
 * Runtime schema for the plain-data reader options
 */
export const ReaderOptionsSchema = type({
  "parser?": ParserNameSchema,
  "bufferSize?": "1024 <= number.integer <= 67108864",
  "decompress?": "boolean",
});
