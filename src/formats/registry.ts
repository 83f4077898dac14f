/**
 * Decoder lookup by parser name
 */

import type { ReadBuffer } from "../io/read-buffer";
import type { DecodableParserName, RecordByParser } from "../types";
import { startSession } from "./abstract-parser";
import type { ParserOptions, ParserSession } from "./abstract-parser";
import { BamParser } from "./bam";
import { COMMA, DsvParser, TAB } from "./dsv";
import { FastaParser } from "./fasta";
import { FastqParser } from "./fastq";
import { InficonParser } from "./inficon";
import { SamParser } from "./sam";

type SessionFactory<K extends DecodableParserName> = (
  buffer: ReadBuffer,
  options: ParserOptions
) => ParserSession<RecordByParser[K]>;

const SESSION_FACTORIES: { readonly [K in DecodableParserName]: SessionFactory<K> } = {
  fasta: (buffer, options) => startSession(new FastaParser(options), buffer),
  fastq: (buffer, options) => startSession(new FastqParser(options), buffer),
  sam: (buffer, options) => startSession(new SamParser(options), buffer),
  bam: (buffer, options) => startSession(new BamParser(options), buffer),
  inficon: (buffer, options) => startSession(new InficonParser(options), buffer),
  csv: (buffer, options) => startSession(new DsvParser(COMMA, options), buffer),
  tsv: (buffer, options) => startSession(new DsvParser(TAB, options), buffer),
};

/** Display names used in errors raised while reading each format */
export const FORMAT_NAMES: { readonly [K in DecodableParserName]: string } = {
  fasta: "FASTA",
  fastq: "FASTQ",
  sam: "SAM",
  bam: "BAM",
  inficon: "Inficon",
  csv: "CSV",
  tsv: "TSV",
};

export function isDecodable(name: string): name is DecodableParserName {
  return Object.hasOwn(SESSION_FACTORIES, name);
}

/**
 * Run the setup of the named decoder against `buffer`
 */
export function openSession<K extends DecodableParserName>(
  name: K,
  buffer: ReadBuffer,
  options: ParserOptions = {}
): ParserSession<RecordByParser[K]> {
  const factory: SessionFactory<K> = SESSION_FACTORIES[name];
  return factory(buffer, options);
}
