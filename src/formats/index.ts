/**
 * Format decoders
 */

export { AbstractParser, END, RecordDriver, startSession } from "./abstract-parser";
export type { ParseOutcome, ParserOptions, ParserSession, RecordParser, RecordPuller } from "./abstract-parser";
export { BamParser } from "./bam";
export { decodeCigar, decodeQuality, decodeSequence } from "./bam/binary";
export { DsvParser } from "./dsv";
export { FastaParser } from "./fasta";
export { FastqParser } from "./fastq";
export { InficonParser } from "./inficon";
export { FORMAT_NAMES, isDecodable, openSession } from "./registry";
export { ALIGNMENT_FIELDS, SamParser } from "./sam";
