/**
 * Delimiter-separated values (CSV, TSV) decoder
 *
 * The first row names the columns. Fields follow RFC 4180 quoting: a field
 * wrapped in double quotes may contain the delimiter, line breaks and
 * doubled quotes. Blank lines are skipped. Values are left as strings.
 */

import { concatBytes, CR, decodeText, LF } from "../io/bytes";
import type { ReadBuffer } from "../io/read-buffer";
import type { DelimitedRecord } from "../types";
import { AbstractParser, END } from "./abstract-parser";
import type { ParseOutcome, ParserOptions } from "./abstract-parser";

const QUOTE = 0x22;
export const COMMA = 0x2c;
export const TAB = 0x09;

type RowScan =
  | { readonly kind: "incomplete"; readonly section: string }
  | { readonly kind: "row"; readonly fields: string[]; readonly consumed: number }
  | { readonly kind: "blank"; readonly consumed: number };

interface DsvState {
  readonly columns: readonly string[];
  pending: string[];
}

export class DsvParser extends AbstractParser<DelimitedRecord, DsvState> {
  readonly format: string;

  constructor(
    private readonly delimiter: number,
    options: ParserOptions = {}
  ) {
    super(options);
    this.format = delimiter === TAB ? "TSV" : delimiter === COMMA ? "CSV" : "DSV";
  }

  initialize(buffer: ReadBuffer): DsvState {
    buffer.reserve(1);
    for (;;) {
      if (buffer.isEmpty && buffer.eof) {
        throw this.error("Missing header row");
      }
      const scan = this.scanRow(buffer.window, buffer.eof);
      if (scan.kind === "incomplete") {
        if (buffer.refill() === 0 && buffer.isEmpty) throw this.error("Missing header row");
        continue;
      }
      buffer.consume(scan.consumed);
      if (scan.kind === "blank") continue;

      const seen = new Set<string>();
      for (const column of scan.fields) {
        if (seen.has(column)) throw this.error(`Duplicate column name '${column}'`);
        seen.add(column);
      }
      return { columns: scan.fields, pending: [] };
    }
  }

  fields(state: DsvState): readonly string[] {
    return state.columns;
  }

  parse(window: Uint8Array, atEof: boolean, state: DsvState): ParseOutcome {
    let offset = 0;
    for (;;) {
      if (offset >= window.length) return atEof ? END : this.needMore(atEof, "row");
      const scan = this.scanRow(window.subarray(offset), atEof);
      if (scan.kind === "incomplete") return this.needMore(atEof, scan.section);
      if (scan.kind === "blank") {
        offset += scan.consumed;
        continue;
      }
      if (scan.fields.length !== state.columns.length) {
        throw this.error(`Expected ${state.columns.length} fields but found ${scan.fields.length}`);
      }
      state.pending = scan.fields;
      return this.record(offset + scan.consumed);
    }
  }

  get(_window: Uint8Array, state: DsvState): DelimitedRecord {
    // own data properties, so a column named "__proto__" is kept
    return Object.fromEntries(
      state.columns.map((column, i): [string, string] => [column, state.pending[i] ?? ""])
    );
  }

  /**
   * Split the row at the start of `window` into fields
   */
  private scanRow(window: Uint8Array, atEof: boolean): RowScan {
    if (window[0] === LF) return { kind: "blank", consumed: 1 };
    if (window[0] === CR && window[1] === LF) return { kind: "blank", consumed: 2 };

    const fields: string[] = [];
    let i = 0;
    for (;;) {
      if (window[i] === QUOTE) {
        const parts: Uint8Array[] = [];
        let segmentStart = i + 1;
        for (;;) {
          const quote = window.indexOf(QUOTE, segmentStart);
          if (quote < 0) {
            if (atEof) throw this.error("Unterminated quoted field");
            return { kind: "incomplete", section: "quoted field" };
          }
          if (quote + 1 >= window.length && !atEof) return { kind: "incomplete", section: "quoted field" };
          if (window[quote + 1] === QUOTE) {
            parts.push(window.subarray(segmentStart, quote + 1));
            segmentStart = quote + 2;
            continue;
          }
          parts.push(window.subarray(segmentStart, quote));
          i = quote + 1;
          break;
        }
        fields.push(decodeText(concatBytes(parts), this.format, "field"));
      } else {
        let end = i;
        while (end < window.length && window[end] !== this.delimiter && window[end] !== LF) end++;
        if (end >= window.length && !atEof) return { kind: "incomplete", section: "row" };
        const fieldEnd = window[end] !== this.delimiter && end > i && window[end - 1] === CR ? end - 1 : end;
        fields.push(decodeText(window.subarray(i, fieldEnd), this.format, "field"));
        i = end;
      }

      if (i >= window.length) {
        if (!atEof) return { kind: "incomplete", section: "row" };
        return { kind: "row", fields, consumed: i };
      }
      const next = window[i];
      if (next === this.delimiter) {
        i++;
        continue;
      }
      if (next === LF) return { kind: "row", fields, consumed: i + 1 };
      if (next === CR) {
        if (i + 1 >= window.length) {
          if (!atEof) return { kind: "incomplete", section: "row" };
          return { kind: "row", fields, consumed: i + 1 };
        }
        if (window[i + 1] === LF) return { kind: "row", fields, consumed: i + 2 };
      }
      throw this.error("Unexpected character after quoted field");
    }
  }
}
