/**
 * Tests for the CSV/TSV decoder
 */

import { describe, expect, test } from "vitest";
import { ParseError } from "../../src/errors";
import { COMMA, DsvParser, TAB } from "../../src/formats/dsv";
import { BufferSource } from "../../src/io/sources";
import { collect, decodeAll, decodeByteByByte, enc, session, thrown } from "../utils/records";

const SAMPLE = 'name,note\r\nalpha,"x, y"\r\nbeta,"say ""hi""\nthere"\r\n\r\ngamma,\r\n';

const ROWS = [
  { name: "alpha", note: "x, y" },
  { name: "beta", note: 'say "hi"\nthere' },
  { name: "gamma", note: "" },
];

function csvError(text: string): ParseError {
  const error = thrown(() => decodeAll(new DsvParser(COMMA), enc(text)));
  if (!(error instanceof ParseError)) throw new Error("expected a ParseError");
  return error;
}

describe("DsvParser", () => {
  test("reads quoted CSV fields", () => {
    expect(decodeAll(new DsvParser(COMMA), enc(SAMPLE))).toEqual(ROWS);
  });

  test("gives the same rows when input arrives one byte at a time", () => {
    expect(decodeByteByByte(new DsvParser(COMMA), enc(SAMPLE))).toEqual(ROWS);
  });

  test("takes column names from the header row", () => {
    const opened = session(new DsvParser(TAB), new BufferSource(enc("\nid\tvalue\nx\t1\ny\t2")));
    expect(opened.format).toBe("TSV");
    expect(opened.headers).toEqual(["id", "value"]);
    expect(collect(opened.driver)).toEqual([
      { id: "x", value: "1" },
      { id: "y", value: "2" },
    ]);
  });

  test("a header row alone gives no records", () => {
    expect(decodeAll(new DsvParser(COMMA), enc("a,b"))).toEqual([]);
  });

  test("rejects input without a header row", () => {
    expect(csvError("").message).toBe("Missing header row");
    expect(csvError("\n\n").message).toBe("Missing header row");
  });

  test("rejects duplicate column names", () => {
    expect(csvError("a,b,a\n").message).toBe("Duplicate column name 'a'");
  });

  test("rejects rows with the wrong number of fields", () => {
    expect(csvError("a,b\n1,2,3\n").message).toBe("Expected 2 fields but found 3");
  });

  test("rejects an unterminated quoted field", () => {
    expect(csvError('a\n"abc\n').message).toBe("Unterminated quoted field");
  });

  test("rejects text after a closing quote", () => {
    expect(csvError('a\n"x"y\n').message).toBe("Unexpected character after quoted field");
  });

  test("keeps a column named __proto__ as an own field", () => {
    const records = decodeAll(new DsvParser(COMMA), enc("__proto__,b\nx,y\n"));
    expect(records).toHaveLength(1);
    expect(Object.entries(records[0] ?? {})).toEqual([
      ["__proto__", "x"],
      ["b", "y"],
    ]);
  });
});
