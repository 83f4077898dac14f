/**
 * FASTQ decoder
 *
 * Four-line records: `@id`, sequence, `+` (optionally repeating the id) and
 * a quality line exactly as long as the sequence. Sequences are not
 * wrapped. A missing newline after the last quality line is accepted.
 */

import { decodeText, LF, trimCR } from "../io/bytes";
import type { FastqRecord } from "../types";
import { AbstractParser, END } from "./abstract-parser";
import type { ParseOutcome } from "./abstract-parser";

const AT = 0x40;
const PLUS = 0x2b;
const FASTQ_FIELDS = ["id", "sequence", "quality"] as const;

interface FastqState {
  headerEnd: number;
  sequenceStart: number;
  sequenceEnd: number;
  qualityStart: number;
  qualityEnd: number;
  /** Positions found by earlier attempts on the current record, or -1 */
  headerNewline: number;
  plus: number;
  secondHeaderNewline: number;
  /** Where the next search resumes */
  scanFrom: number;
}

export class FastqParser extends AbstractParser<FastqRecord, FastqState> {
  readonly format = "FASTQ";

  initialize(): FastqState {
    return {
      headerEnd: 0,
      sequenceStart: 0,
      sequenceEnd: 0,
      qualityStart: 0,
      qualityEnd: 0,
      headerNewline: -1,
      plus: -1,
      secondHeaderNewline: -1,
      scanFrom: 0,
    };
  }

  fields(): readonly string[] {
    return FASTQ_FIELDS;
  }

  parse(window: Uint8Array, atEof: boolean, state: FastqState): ParseOutcome {
    if (window.length === 0) return atEof ? END : this.needMore(atEof, "header");
    if (window[0] !== AT) throw this.error("Valid FASTQ records start with '@'");

    if (state.headerNewline < 0) {
      state.headerNewline = window.indexOf(LF, state.scanFrom);
      if (state.headerNewline < 0) return this.waitFor(window, atEof, state, "header");
      state.scanFrom = state.headerNewline + 1;
    }
    const headerNewline = state.headerNewline;
    const sequenceStart = headerNewline + 1;

    if (state.plus < 0) {
      state.plus = window.indexOf(PLUS, state.scanFrom);
      if (state.plus < 0) return this.waitFor(window, atEof, state, "sequence");
      if (state.plus === sequenceStart || window[state.plus - 1] !== LF) {
        throw this.error("Unexpected + found in sequence");
      }
      state.scanFrom = state.plus;
    }
    const plus = state.plus;
    const sequenceEnd = trimCR(window, sequenceStart, plus - 1);

    if (state.secondHeaderNewline < 0) {
      state.secondHeaderNewline = window.indexOf(LF, state.scanFrom);
      if (state.secondHeaderNewline < 0) return this.waitFor(window, atEof, state, "second header");
    }
    const secondHeaderNewline = state.secondHeaderNewline;

    const qualityStart = secondHeaderNewline + 1;
    const qualityEnd = qualityStart + (sequenceEnd - sequenceStart);
    let recordEnd = qualityEnd + (plus - sequenceEnd);
    if (recordEnd > window.length) {
      if (!atEof || qualityEnd > window.length) return this.needMore(atEof, "quality");
      recordEnd = window.length;
    }

    state.headerEnd = trimCR(window, 1, headerNewline);
    state.sequenceStart = sequenceStart;
    state.sequenceEnd = sequenceEnd;
    state.qualityStart = qualityStart;
    state.qualityEnd = qualityEnd;
    state.headerNewline = -1;
    state.plus = -1;
    state.secondHeaderNewline = -1;
    state.scanFrom = 0;
    return this.record(recordEnd);
  }

  /**
   * Note that the search ran off the end of `window`, then ask for more
   */
  private waitFor(window: Uint8Array, atEof: boolean, state: FastqState, section: string): ParseOutcome {
    state.scanFrom = window.length;
    return this.needMore(atEof, section);
  }

  get(window: Uint8Array, state: FastqState): FastqRecord {
    return {
      id: decodeText(window.subarray(1, state.headerEnd), this.format, "header"),
      sequence: decodeText(window.subarray(state.sequenceStart, state.sequenceEnd), this.format, "sequence"),
      quality: decodeText(window.subarray(state.qualityStart, state.qualityEnd), this.format, "quality"),
    };
  }
}
