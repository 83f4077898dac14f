/**
 * Tests for the BAM decoder
 */

import { describe, expect, test } from "vitest";
import { BamError, ParseError } from "../../src/errors";
import { BamParser } from "../../src/formats/bam";
import { SamParser } from "../../src/formats/sam";
import { BufferSource } from "../../src/io/sources";
import { bamHeader, bamRecord, concat } from "../utils/builders";
import { decodeAll, decodeByteByByte, enc, session, thrown } from "../utils/records";

const HEADER = bamHeader("@HD\tVN:1.6\n", [
  { name: "chr1", length: 1000 },
  { name: "chr2", length: 500 },
]);

const RECORD1 = bamRecord({
  name: "read1",
  refId: 0,
  pos: 99,
  mapq: 60,
  cigar: [[4, 0]],
  seq: "ACGT",
  qual: [30, 30, 30, 30],
});

const RECORD2 = bamRecord({ name: "read2", flag: 4 });

const FILE = concat(HEADER, RECORD1, RECORD2);

const READ1 = {
  queryName: "read1",
  flag: 0,
  refName: "chr1",
  pos: 99,
  mapq: 60,
  cigar: "4M",
  rnext: "",
  pnext: null,
  tlen: 0,
  seq: "ACGT",
  qual: "????",
  extra: "",
};

const READ2 = {
  queryName: "read2",
  flag: 4,
  refName: "",
  pos: null,
  mapq: null,
  cigar: "",
  rnext: "",
  pnext: null,
  tlen: 0,
  seq: "",
  qual: "",
  extra: "",
};

function bamError(bytes: Uint8Array): BamError {
  const error = thrown(() => decodeAll(new BamParser(), bytes));
  if (!(error instanceof BamError)) throw new Error("expected a BamError");
  return error;
}

describe("BamParser", () => {
  test("decodes alignments", () => {
    expect(decodeAll(new BamParser(), FILE)).toEqual([READ1, READ2]);
  });

  test("gives the same records when input arrives one byte at a time", () => {
    expect(decodeByteByByte(new BamParser(), FILE)).toEqual([READ1, READ2]);
  });

  test("keeps the header text and reference table as metadata", () => {
    const opened = session(new BamParser(), new BufferSource(FILE));
    expect(opened.metadata).toEqual({
      header: "@HD\tVN:1.6\n",
      references: [
        { name: "chr1", length: 1000 },
        { name: "chr2", length: 500 },
      ],
    });
  });

  test("decodes odd-length sequences, mates and CIGAR strings", () => {
    const record = bamRecord({
      name: "pair",
      refId: 1,
      pos: 10,
      mapq: 0,
      flag: 99,
      cigar: [
        [3, 0],
        [1, 1],
        [2, 4],
      ],
      seq: "ACGTN",
      qual: null,
      nextRefId: 0,
      nextPos: 200,
      tlen: -150,
    });
    expect(decodeAll(new BamParser(), concat(HEADER, record))).toEqual([
      {
        queryName: "pair",
        flag: 99,
        refName: "chr2",
        pos: 10,
        mapq: 0,
        cigar: "3M1I2S",
        rnext: "chr1",
        pnext: 200,
        tlen: -150,
        seq: "ACGTN",
        qual: "",
        extra: "",
      },
    ]);
  });

  test("rejects a bad magic number", () => {
    const bytes = FILE.slice();
    bytes[3] = 0x02;
    const error = bamError(bytes);
    expect(error.message).toBe("Not a valid BAM file");
    expect(error.field).toBe("magic");
  });

  test("positions record errors at the failing record", () => {
    const bad = bamRecord({ name: "bad", refId: 5, pos: 1 });
    const error = bamError(concat(HEADER, RECORD1, bad));
    expect(error.reason).toBe("Invalid reference sequence ID 5");
    expect(error.byteOffset).toBe(HEADER.length + RECORD1.length);
    expect(error.recordIndex).toBe(2);
    expect(error.message).toBe(`Invalid reference sequence ID 5 (byte ${HEADER.length + RECORD1.length}, record 2)`);
  });

  test("rejects negative reference ids other than -1", () => {
    const error = bamError(concat(HEADER, bamRecord({ name: "m", nextRefId: -2 })));
    expect(error.reason).toBe("Invalid next reference sequence ID -2");
  });

  test("rejects blocks shorter than the fixed fields", () => {
    const error = bamError(concat(HEADER, bamRecord({ name: "short", blockSize: 20 })));
    expect(error.reason).toBe("Record is unexpectedly short");
    expect(error.byteOffset).toBe(HEADER.length);
    expect(error.recordIndex).toBe(1);
  });

  test("rejects blocks larger than 256 MiB at the failing record", () => {
    const huge = bamRecord({ name: "big", blockSize: 256 * 1024 * 1024 + 1 });
    const error = bamError(concat(HEADER, RECORD1, huge));
    expect(error.reason).toBe("Record length 268435457 exceeds the 268435456 byte limit");
    expect(error.byteOffset).toBe(HEADER.length + RECORD1.length);
    expect(error.recordIndex).toBe(2);
  });

  test("rejects blocks too small for their declared contents", () => {
    const full = bamRecord({ name: "trim", seq: "ACGT", qual: [1, 2, 3, 4] });
    // declared block ends two bytes into the quality scores
    const shrunk = bamRecord({ name: "trim", seq: "ACGT", qual: [1, 2, 3, 4], blockSize: full.length - 6 });
    const error = bamError(concat(HEADER, shrunk.subarray(0, shrunk.length - 2)));
    expect(error.reason).toBe("Record ended abruptly while reading the sequence");
  });

  test("decodes the sequence match and mismatch CIGAR operations", () => {
    const records = decodeAll(new BamParser(), concat(HEADER, bamRecord({ name: "x", cigar: [[3, 7], [2, 8]] })));
    expect(records[0]?.cigar).toBe("3=2X");
  });

  test("rejects unknown CIGAR operations", () => {
    const error = bamError(concat(HEADER, bamRecord({ name: "c", cigar: [[5, 9]] })));
    expect(error.reason).toBe("Invalid CIGAR operation code 9");
  });

  test("a record cut off by the end of input is incomplete", () => {
    const error = thrown(() => decodeAll(new BamParser(), concat(HEADER, RECORD1.subarray(0, RECORD1.length - 3))));
    expect(error).toBeInstanceOf(ParseError);
    if (error instanceof ParseError) {
      expect(error.reason).toBe("Record ended prematurely in record");
      expect(error.incomplete).toBe(true);
      expect(error.byteOffset).toBe(HEADER.length);
      expect(error.recordIndex).toBe(1);
    }
  });

  test("every truncation either ends on a record boundary or fails", () => {
    const boundaries = new Map([
      [HEADER.length, 0],
      [HEADER.length + RECORD1.length, 1],
      [FILE.length, 2],
    ]);
    for (let cut = 0; cut <= FILE.length; cut++) {
      const prefix = FILE.subarray(0, cut);
      const expected = boundaries.get(cut);
      if (expected !== undefined) {
        expect(decodeAll(new BamParser(), prefix)).toHaveLength(expected);
      } else {
        expect(thrown(() => decodeAll(new BamParser(), prefix))).toBeInstanceOf(ParseError);
      }
    }
  });

  test("matches the SAM text of the same alignment", () => {
    const sam = decodeAll(new SamParser(), enc("read1\t0\tchr1\t100\t60\t4M\t*\t0\t0\tACGT\t????\n"));
    expect(sam).toEqual([READ1]);
  });
});
