/**
 * SAM decoder
 *
 * Header lines (`@HD`, `@SQ`, ...) are skipped during setup and kept as
 * metadata. Each following line is one tab-separated alignment:
 *
 * QNAME FLAG RNAME POS MAPQ CIGAR RNEXT PNEXT TLEN SEQ QUAL [TAG...]
 *
 * `*` becomes "", positions become 0-based with 0 meaning unavailable, and
 * a mapping quality of 255 means unavailable. Optional fields are kept
 * joined with `|`.
 */

import { ascii, concatBytes, CR, decodeText, LF, trimCR } from "../io/bytes";
import type { ReadBuffer } from "../io/read-buffer";
import type { AlignmentRecord, ReaderMetadata } from "../types";
import { AbstractParser, END } from "./abstract-parser";
import type { ParseOutcome } from "./abstract-parser";

const AT = 0x40;
const NEWLINE = ascii("\n");
const MANDATORY_FIELD_COUNT = 11;
const UNAVAILABLE_MAPQ = 255;

export const ALIGNMENT_FIELDS = [
  "queryName",
  "flag",
  "refName",
  "pos",
  "mapq",
  "cigar",
  "rnext",
  "pnext",
  "tlen",
  "seq",
  "qual",
  "extra",
] as const;

interface SamState {
  readonly header: string;
  lineStart: number;
  lineEnd: number;
  /** Where the newline search resumes after asking for more input */
  scanFrom: number;
}

export class SamParser extends AbstractParser<AlignmentRecord, SamState> {
  readonly format = "SAM";

  initialize(buffer: ReadBuffer): SamState {
    const headerParts: Uint8Array[] = [];
    const keep = (bytes: Uint8Array): void => {
      headerParts.push(bytes.slice());
    };

    buffer.reserve(1);
    while (!buffer.isEmpty && buffer.window[0] === AT) {
      if (!buffer.seekPattern(NEWLINE, keep)) {
        // last header line without a newline
        if (!buffer.isEmpty) keep(buffer.consume(buffer.length));
        break;
      }
      keep(buffer.consume(1));
      buffer.reserve(1);
    }

    const header = decodeText(concatBytes(headerParts), this.format, "header");
    return { header, lineStart: 0, lineEnd: 0, scanFrom: 0 };
  }

  fields(): readonly string[] {
    return ALIGNMENT_FIELDS;
  }

  override metadata(state: SamState): ReaderMetadata {
    return { header: state.header };
  }

  parse(window: Uint8Array, atEof: boolean, state: SamState): ParseOutcome {
    let lineStart = 0;
    while (lineStart < window.length && (window[lineStart] === LF || window[lineStart] === CR)) {
      lineStart++;
    }
    if (lineStart >= window.length) return atEof ? END : this.needMore(atEof, "record");

    const newline = window.indexOf(LF, Math.max(lineStart, state.scanFrom));
    if (newline < 0 && !atEof) {
      state.scanFrom = window.length;
      return this.needMore(atEof, "record");
    }
    state.scanFrom = 0;

    const lineEnd = newline < 0 ? window.length : newline;
    state.lineStart = lineStart;
    state.lineEnd = trimCR(window, lineStart, lineEnd);
    return this.record(newline < 0 ? window.length : newline + 1);
  }

  get(window: Uint8Array, state: SamState): AlignmentRecord {
    const line = decodeText(window.subarray(state.lineStart, state.lineEnd), this.format, "record");
    const fields = line.split("\t");
    if (fields.length < MANDATORY_FIELD_COUNT) {
      throw this.error("Sam record too short", { context: line });
    }
    const [queryName, flag, refName, pos, mapq, cigar, rnext, pnext, tlen, seq, qual] = fields;

    const record: AlignmentRecord = {
      queryName: queryName ?? "",
      flag: this.integer(flag, "flag"),
      refName: orEmpty(refName),
      pos: this.position(pos, "pos"),
      mapq: this.mappingQuality(mapq),
      cigar: orEmpty(cigar),
      rnext: orEmpty(rnext),
      pnext: this.position(pnext, "pnext"),
      tlen: this.integer(tlen, "tlen"),
      seq: orEmpty(seq),
      qual: orEmpty(qual),
      extra: fields.slice(MANDATORY_FIELD_COUNT).join("|"),
    };

    if (record.seq !== "" && record.qual !== "" && record.seq.length !== record.qual.length) {
      this.warn(
        `Record ${record.queryName}: quality length ${record.qual.length} differs from sequence length ${record.seq.length}`
      );
    }
    return record;
  }

  private integer(value: string | undefined, field: string): number {
    if (value === undefined || !/^[+-]?\d+$/.test(value)) {
      throw this.error(`Invalid integer in ${field}: '${value ?? ""}'`);
    }
    return Number.parseInt(value, 10);
  }

  private position(value: string | undefined, field: string): number | null {
    const parsed = this.integer(value, field);
    return parsed === 0 ? null : parsed - 1;
  }

  private mappingQuality(value: string | undefined): number | null {
    const parsed = this.integer(value, "mapq");
    return parsed === UNAVAILABLE_MAPQ ? null : parsed;
  }
}

function orEmpty(value: string | undefined): string {
  return value === undefined || value === "*" ? "" : value;
}
