/**
 * Tests for the Inficon Hapsite decoder
 */

import { describe, expect, test } from "vitest";
import { InficonError, ParseError } from "../../src/errors";
import { InficonParser } from "../../src/formats/inficon";
import { BufferSource } from "../../src/io/sources";
import { inficonFile } from "../utils/builders";
import type { InficonRange, InficonScan } from "../utils/builders";
import { decodeAll, decodeByteByByte, session, thrown } from "../utils/records";

const SEGMENTS: InficonRange[][] = [[{ start: 1000, end: 1200, type: 1 }], [{ start: 4550, end: 4550, type: 0 }]];

const SCANS: InficonScan[] = [
  { time: 60000, segment: 0, intensities: [1.5, 2.25, 100] },
  { time: 90000, segment: 1, intensities: [7] },
];

const RECORDS = [
  { time: 1, mz: 10, intensity: 1.5 },
  { time: 1, mz: 11, intensity: 2.25 },
  { time: 1, mz: 12, intensity: 100 },
  { time: 1.5, mz: 45.5, intensity: 7 },
];

function inficonError(bytes: Uint8Array): InficonError {
  const error = thrown(() => decodeAll(new InficonParser(), bytes));
  if (!(error instanceof InficonError)) throw new Error("expected an InficonError");
  return error;
}

describe("InficonParser", () => {
  test("emits one record per intensity", () => {
    expect(decodeAll(new InficonParser(), inficonFile(SEGMENTS, SCANS).bytes)).toEqual(RECORDS);
  });

  test("gives the same records when input arrives one byte at a time", () => {
    expect(decodeByteByByte(new InficonParser(), inficonFile(SEGMENTS, SCANS).bytes)).toEqual(RECORDS);
  });

  test("names time, mz and intensity as its fields", () => {
    const opened = session(new InficonParser(), new BufferSource(inficonFile(SEGMENTS, SCANS).bytes));
    expect(opened.headers).toEqual(["time", "mz", "intensity"]);
    expect(opened.metadata).toEqual({});
  });

  test("stops at the declared data length and warns about the rest", () => {
    const warnings: string[] = [];
    const parser = new InficonParser({ onWarning: (message) => warnings.push(message) });
    const { bytes } = inficonFile(SEGMENTS, SCANS, { trailer: [1, 2, 3] });
    expect(decodeAll(parser, bytes)).toEqual(RECORDS);
    expect(warnings).toEqual(["Ignoring 3 bytes after the declared scan data"]);
  });

  test("rejects bad magic bytes", () => {
    const bytes = inficonFile(SEGMENTS, SCANS).bytes.slice();
    bytes[0] = 0x05;
    expect(inficonError(bytes).message).toBe("Inficon file has bad magic bytes");
  });

  test("rejects inverted m/z ranges", () => {
    const { bytes } = inficonFile([[{ start: 1200, end: 1000, type: 1 }]], []);
    expect(inficonError(bytes).message).toBe("m/z range is too big or invalid");
  });

  test("rejects more than 10,000 segments", () => {
    const { bytes } = inficonFile([], [], { segmentCount: 10_001 });
    expect(inficonError(bytes).message).toBe("Inficon file has too many segments");
  });

  test("rejects more than 100,000 m/z ranges in a segment", () => {
    const { bytes } = inficonFile([[]], [], { rangeCount: 100_001 });
    expect(inficonError(bytes).message).toBe("Too many m/z ranges");
  });

  test("rejects an m/z range ending above 4,000,000,000", () => {
    const { bytes } = inficonFile([[{ start: 0, end: 4_000_000_001, type: 0 }]], []);
    expect(inficonError(bytes).message).toBe("End of m/z range is invalid");
  });

  test("rejects full-scan ranges 200,000 units wide or wider", () => {
    const { bytes } = inficonFile([[{ start: 100, end: 200_100, type: 1 }]], []);
    expect(inficonError(bytes).message).toBe("m/z range is too big or invalid");
  });

  test("accepts a full-scan range just under the width limit", () => {
    const { bytes } = inficonFile([[{ start: 100, end: 200_000, type: 1 }]], []);
    expect(decodeAll(new InficonParser(), bytes)).toEqual([]);
  });

  test("fails when the scan data marker is missing", () => {
    const { bytes, scanStart } = inficonFile(SEGMENTS, SCANS);
    expect(inficonError(bytes.subarray(0, scanStart - 256)).message).toBe("Could not find start of scan data");
  });

  test("positions a scan naming an unknown segment", () => {
    const { bytes, scanStart } = inficonFile(SEGMENTS, [{ time: 0, segment: 5, intensities: [1] }]);
    const error = inficonError(bytes);
    expect(error.reason).toBe("Invalid segment number (5) specified");
    expect(error.byteOffset).toBe(scanStart);
    expect(error.recordIndex).toBe(1);
  });

  test("rejects scans whose intensity count disagrees with the segment", () => {
    const { bytes, scanStart } = inficonFile(SEGMENTS, [
      { time: 0, segment: 1, intensities: [4] },
      { time: 0, segment: 0, intensities: [1, 2], count: 2 },
    ]);
    const error = inficonError(bytes);
    expect(error.reason).toBe("Number of intensities (2) doesn't match number of mzs (3)");
    expect(error.byteOffset).toBe(scanStart + 20);
    expect(error.recordIndex).toBe(2);
  });

  test("scan data ending early is incomplete", () => {
    const { bytes } = inficonFile(SEGMENTS, SCANS);
    const error = thrown(() => decodeAll(new InficonParser(), bytes.subarray(0, bytes.length - 2)));
    expect(error).toBeInstanceOf(ParseError);
    if (error instanceof ParseError) {
      expect(error.reason).toBe("Record ended prematurely in intensity");
      expect(error.incomplete).toBe(true);
      expect(error.recordIndex).toBe(4);
    }
  });

  test("every truncated file fails", () => {
    const { bytes } = inficonFile(SEGMENTS, SCANS);
    for (let cut = 0; cut < bytes.length; cut++) {
      expect(thrown(() => decodeAll(new InficonParser(), bytes.subarray(0, cut)))).toBeInstanceOf(ParseError);
    }
  });
});
