/**
 * Tests for the FASTA decoder
 */

import { describe, expect, test } from "vitest";
import { ParseError } from "../../src/errors";
import { FastaParser } from "../../src/formats/fasta";
import { decodeAll, decodeByteByByte, enc, thrown } from "../utils/records";

const SAMPLE = ">seq1 desc\nACGT\nAC\r\n>seq2\n\n>seq3\nTT";

describe("FastaParser", () => {
  test("joins wrapped sequence lines", () => {
    expect(decodeAll(new FastaParser(), enc(SAMPLE))).toEqual([
      { id: "seq1 desc", sequence: "ACGTAC" },
      { id: "seq2", sequence: "" },
      { id: "seq3", sequence: "TT" },
    ]);
  });

  test("gives the same records when input arrives one byte at a time", () => {
    expect(decodeByteByByte(new FastaParser(), enc(SAMPLE))).toEqual(decodeAll(new FastaParser(), enc(SAMPLE)));
  });

  test("a header followed directly by another header has an empty sequence", () => {
    expect(decodeAll(new FastaParser(), enc(">a\n>b\nGG\n"))).toEqual([
      { id: "a", sequence: "" },
      { id: "b", sequence: "GG" },
    ]);
  });

  test("accepts an empty id and CRLF headers", () => {
    expect(decodeAll(new FastaParser(), enc(">\r\nAC\r\nGT\r\n"))).toEqual([{ id: "", sequence: "ACGT" }]);
  });

  test("empty input has no records", () => {
    expect(decodeAll(new FastaParser(), new Uint8Array(0))).toEqual([]);
  });

  test("rejects records that do not start with '>'", () => {
    const error = thrown(() => decodeAll(new FastaParser(), enc("ACGT\n")));
    expect(error).toBeInstanceOf(ParseError);
    if (error instanceof ParseError) {
      expect(error.message).toBe("Valid FASTA records start with '>'");
      expect(error.format).toBe("FASTA");
      expect(error.positioned).toBe(false);
    }
  });

  test("a header cut off by the end of input is incomplete", () => {
    const error = thrown(() => decodeAll(new FastaParser(), enc(">a\nAC\n>b")));
    expect(error).toBeInstanceOf(ParseError);
    if (error instanceof ParseError) {
      expect(error.message).toBe("Record ended prematurely in header");
      expect(error.incomplete).toBe(true);
    }
  });

  test("rejects invalid UTF-8 in the header", () => {
    const bytes = Uint8Array.from([0x3e, 0xff, 0x0a, 0x41, 0x0a]);
    const error = thrown(() => decodeAll(new FastaParser(), bytes));
    expect(error).toBeInstanceOf(ParseError);
    if (error instanceof ParseError) {
      expect(error.message).toBe("Invalid UTF-8 in header");
    }
  });

  test("joins multi-line sequences and accepts empty records", () => {
    expect(decodeAll(new FastaParser(), enc(">id\nACGT\nAAAA\n>id2\nTGCA"))).toEqual([
      { id: "id", sequence: "ACGTAAAA" },
      { id: "id2", sequence: "TGCA" },
    ]);
    expect(decodeAll(new FastaParser(), enc(">hd\n\n>\n\n"))).toEqual([
      { id: "hd", sequence: "" },
      { id: "", sequence: "" },
    ]);
  });
});
