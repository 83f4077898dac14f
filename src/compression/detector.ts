/**
 * File type detection from leading bytes, extensions and parser names
 *
 * Classification is a priority-ordered magic byte table: eight-byte
 * signatures first, then four, two and one byte ones. A signature applies
 * whenever the prefix is at least as long as the signature.
 */

import { startsWith } from "../io/bytes";
import { PARSER_NAMES } from "../types";
import type { FileType, NamedFileKind, ParserName } from "../types";

type Signature = readonly [magic: readonly number[], kind: NamedFileKind];

const bytesOf = (text: string): number[] => Array.from(text, (char) => char.charCodeAt(0));

const EIGHT_BYTE_SIGNATURES: readonly Signature[] = [
  [bytesOf("FCS2.0  "), "facs"],
  [bytesOf("FCS3.0  "), "facs"],
  [bytesOf("FCS3.1  "), "facs"],
  [bytesOf("~VERSION"), "las"],
  [bytesOf("~Version"), "las"],
  [[0x89, ...bytesOf("PNG"), 0x0d, 0x0a, 0x1a, 0x0a], "png"],
  [[0x89, ...bytesOf("HDF"), 0x0d, 0x0a, 0x1a, 0x0a], "hdf5"],
  [[0x04, 0x03, 0x02, 0x01, ...bytesOf("SPAH")], "inficon-hapsite"],
  [[0xae, ...bytesOf("ZTR"), 0x0d, 0x0a, 0x1a, 0x0a], "ztr"],
  [[0x01, 0xa1, 0x46, 0x00, 0x69, 0x00, 0x6e, 0x00], "thermo-raw"],
];

const FOUR_BYTE_SIGNATURES: readonly Signature[] = [
  [[...bytesOf("BAM"), 0x01], "bam"],
  [bytesOf("@HD\t"), "sam"],
  [bytesOf("@SQ\t"), "sam"],
  [bytesOf(".scf"), "scf"],
  [[0x02, 0x38, 0x31, 0x00], "agilent-chemstation-fid"],
  [[0x01, 0x32, 0x00, 0x00], "agilent-chemstation-ms"],
  [[0x02, 0x33, 0x30, 0x00], "agilent-chemstation-mwd"],
  [[0x03, 0x31, 0x33, 0x31], "agilent-chemstation-uv"],
  [[0x28, 0xb5, 0x2f, 0xfd], "zstd"],
];

const TWO_BYTE_SIGNATURES: readonly Signature[] = [
  [[0x1f, 0x8b], "gzip"],
  [[0x0f, 0x8b], "gzip"],
  [[0x42, 0x5a], "bzip"],
  [[0xfd, 0x37], "lzma"],
  [[0x24, 0x00], "bruker-baf"],
  [[0x43, 0x44], "netcdf"],
];

const ONE_BYTE_SIGNATURES: readonly Signature[] = [
  [bytesOf(">"), "fasta"],
  [bytesOf("@"), "fastq"],
];

// Thermo continuous-flow and dual-inlet files share a header; CF files name
// their acquisition "CIsoGC" in UTF-16 at bytes 52..64.
const THERMO_MAGIC_PREFIX = [0xff, 0xff];
const THERMO_MAGIC_SUFFIX = [0x00];
const THERMO_VERSIONS = [0x05, 0x06];
const THERMO_CF_MARKER = Array.from("CIsoGC").flatMap((char) => [char.charCodeAt(0), 0x00]);
const THERMO_CF_MARKER_OFFSET = 52;
const THERMO_CF_MIN_PREFIX = 78;

const SIGNATURE_TABLES = [EIGHT_BYTE_SIGNATURES, FOUR_BYTE_SIGNATURES, TWO_BYTE_SIGNATURES, ONE_BYTE_SIGNATURES];

function matches(prefix: Uint8Array, magic: readonly number[], at = 0): boolean {
  return startsWith(prefix, Uint8Array.from(magic), at);
}

function classifyThermo(prefix: Uint8Array): FileType | undefined {
  if (prefix.length < 4) return undefined;
  if (!matches(prefix, THERMO_MAGIC_PREFIX) || !matches(prefix, THERMO_MAGIC_SUFFIX, 3)) return undefined;
  if (!THERMO_VERSIONS.includes(prefix[2] ?? -1)) return undefined;
  if (prefix.length >= THERMO_CF_MIN_PREFIX && matches(prefix, THERMO_CF_MARKER, THERMO_CF_MARKER_OFFSET)) {
    return { kind: "thermo-cf" };
  }
  return { kind: "thermo-dxf" };
}

/**
 * Classify a stream from its leading bytes
 *
 * @example
 * ```typescript
 * classify(new Uint8Array([0x1f, 0x8b, 0x08])); // { kind: "gzip" }
 * classify(new TextEncoder().encode(">seq1\nACGT\n")); // { kind: "fasta" }
 * ```
 */
export function classify(prefix: Uint8Array): FileType {
  for (const table of SIGNATURE_TABLES) {
    for (const [magic, kind] of table) {
      if (matches(prefix, magic)) return { kind };
    }
    if (table === FOUR_BYTE_SIGNATURES) {
      const thermo = classifyThermo(prefix);
      if (thermo !== undefined) return thermo;
    }
  }
  return { kind: "unknown" };
}

const EXTENSIONS: Readonly<Record<string, readonly NamedFileKind[]>> = {
  gz: ["gzip"],
  gzip: ["gzip"],
  bz: ["bzip"],
  bz2: ["bzip"],
  bzip: ["bzip"],
  xz: ["lzma"],
  zstd: ["zstd"],
  ch: ["agilent-chemstation-fid", "agilent-chemstation-mwd"],
  ms: ["agilent-chemstation-ms"],
  uv: ["agilent-chemstation-uv"],
  bam: ["bam"],
  baf: ["bruker-baf"],
  ami: ["bruker-msms"],
  fcs: ["facs"],
  lmd: ["facs"],
  fa: ["fasta"],
  faa: ["fasta"],
  fasta: ["fasta"],
  fna: ["fasta"],
  faq: ["fastq"],
  fastq: ["fastq"],
  fq: ["fastq"],
  hdf: ["hdf5"],
  raw: ["thermo-raw"],
  mzxml: ["mzxml"],
  cdf: ["netcdf"],
  png: ["png"],
  hps: ["inficon-hapsite"],
  sam: ["sam"],
  scf: ["scf"],
  cf: ["thermo-cf"],
  dxf: ["thermo-dxf"],
  idx: ["waters-autospec"],
  ztr: ["ztr"],
};

/**
 * Candidate file types for a file extension (without the dot, case-sensitive)
 */
export function fileTypesForExtension(extension: string): FileType[] {
  const kinds = Object.hasOwn(EXTENSIONS, extension) ? EXTENSIONS[extension] : undefined;
  if (kinds === undefined) return [{ kind: "unknown" }];
  return kinds.map((kind) => ({ kind }));
}

const COMMA = 0x2c;
const TAB = 0x09;

const PARSER_FILE_TYPES: Readonly<Record<ParserName, FileType>> = {
  chemstation_fid: { kind: "agilent-chemstation-fid" },
  chemstation_ms: { kind: "agilent-chemstation-ms" },
  chemstation_mwd: { kind: "agilent-chemstation-mwd" },
  chemstation_uv: { kind: "agilent-chemstation-uv" },
  bam: { kind: "bam" },
  csv: { kind: "delimited-text", delimiter: COMMA },
  fcs: { kind: "facs" },
  fasta: { kind: "fasta" },
  fastq: { kind: "fastq" },
  inficon: { kind: "inficon-hapsite" },
  png: { kind: "png" },
  sam: { kind: "sam" },
  thermo_cf: { kind: "thermo-cf" },
  thermo_dxf: { kind: "thermo-dxf" },
  tsv: { kind: "delimited-text", delimiter: TAB },
};

const PARSER_NAME_BY_KIND = new Map<string, ParserName>();
for (const name of PARSER_NAMES) {
  const fileType = PARSER_FILE_TYPES[name];
  if (fileType.kind !== "delimited-text") PARSER_NAME_BY_KIND.set(fileType.kind, name);
}

export function isParserName(name: string): name is ParserName {
  return Object.hasOwn(PARSER_FILE_TYPES, name);
}

/**
 * File type a parser name decodes; unknown names give `{ kind: "unknown" }`
 */
export function fileTypeForParserName(name: string): FileType {
  return isParserName(name) ? PARSER_FILE_TYPES[name] : { kind: "unknown" };
}

/**
 * Parser name for a file type, or `"unsupported/<kind>"` when it has none
 */
export function parserNameForFileType(fileType: FileType): string {
  if (fileType.kind === "delimited-text") {
    if (fileType.delimiter === COMMA) return "csv";
    if (fileType.delimiter === TAB) return "tsv";
    return `unsupported/delimited-text(${fileType.delimiter})`;
  }
  return PARSER_NAME_BY_KIND.get(fileType.kind) ?? `unsupported/${fileType.kind}`;
}
