/**
 * FASTA decoder
 *
 * A record is `>` plus a header line, then sequence lines up to the next
 * line starting with `>` or the end of input. Line breaks (LF or CRLF) are
 * removed from the sequence. Empty ids and empty sequences are allowed.
 *
 * @example
 * ```typescript
 * const reader = createReader("fasta", new TextEncoder().encode(">chr1\nACGT\nAC\n"));
 * reader.next(); // { id: "chr1", sequence: "ACGTAC" }
 * ```
 */

import { concatBytes, decodeText, LF, trimCR } from "../io/bytes";
import type { FastaRecord } from "../types";
import { AbstractParser, END } from "./abstract-parser";
import type { ParseOutcome } from "./abstract-parser";

const GT = 0x3e;
const FASTA_FIELDS = ["id", "sequence"] as const;

interface FastaState {
  headerEnd: number;
  sequenceStart: number;
  /** End of the record's bytes (start of the next header or of nothing) */
  recordEnd: number;
  /** Newlines found inside the sequence so far */
  newlines: number[];
  /** Where the newline scan resumes after asking for more input */
  scanFrom: number;
}

export class FastaParser extends AbstractParser<FastaRecord, FastaState> {
  readonly format = "FASTA";

  initialize(): FastaState {
    return { headerEnd: 0, sequenceStart: 0, recordEnd: 0, newlines: [], scanFrom: 0 };
  }

  fields(): readonly string[] {
    return FASTA_FIELDS;
  }

  parse(window: Uint8Array, atEof: boolean, state: FastaState): ParseOutcome {
    if (window.length === 0) return atEof ? END : this.needMore(atEof, "header");
    if (window[0] !== GT) throw this.error("Valid FASTA records start with '>'");

    const headerNewline = window.indexOf(LF);
    if (headerNewline < 0) return this.needMore(atEof, "header");
    state.headerEnd = trimCR(window, 1, headerNewline);
    state.sequenceStart = headerNewline + 1;

    if (state.sequenceStart < window.length && window[state.sequenceStart] === GT) {
      state.recordEnd = state.sequenceStart;
      return this.record(state.recordEnd);
    }
    if (state.sequenceStart >= window.length && !atEof) return this.needMore(atEof, "sequence");

    // A newline is only settled once the byte after it is buffered, since
    // that byte decides whether the record ends there.
    let cursor = Math.max(state.sequenceStart, state.scanFrom);
    for (;;) {
      const newline = window.indexOf(LF, cursor);
      if (newline < 0 || newline + 1 >= window.length) {
        state.scanFrom = newline < 0 ? window.length : newline;
        break;
      }
      state.newlines.push(newline);
      if (window[newline + 1] === GT) {
        state.recordEnd = newline + 1;
        return this.record(state.recordEnd);
      }
      cursor = newline + 1;
    }

    if (!atEof) return this.needMore(atEof, "sequence");

    for (let newline = window.indexOf(LF, state.scanFrom); newline >= 0; newline = window.indexOf(LF, newline + 1)) {
      state.newlines.push(newline);
    }
    state.recordEnd = window.length;
    return this.record(state.recordEnd);
  }

  get(window: Uint8Array, state: FastaState): FastaRecord {
    const id = decodeText(window.subarray(1, state.headerEnd), this.format, "header");

    const spans: Uint8Array[] = [];
    let spanStart = state.sequenceStart;
    for (const newline of state.newlines) {
      spans.push(window.subarray(spanStart, trimCR(window, spanStart, newline)));
      spanStart = newline + 1;
    }
    spans.push(window.subarray(spanStart, trimCR(window, spanStart, state.recordEnd)));
    const sequence = decodeText(concatBytes(spans.filter((span) => span.length > 0)), this.format, "sequence");

    state.newlines = [];
    state.scanFrom = 0;
    return { id, sequence };
  }
}
