/**
 * Inficon Hapsite mass spectrometry decoder
 *
 * The layout is reverse-engineered, so sections are found by scanning for
 * fixed byte patterns and skipping fixed distances from them:
 *
 * 1. Magic `04 03 02 01`.
 * 2. The method section ends in a 44-byte marker; 148 bytes from the start
 *    of that marker sits the segment count, followed by each segment's
 *    96-byte header and m/z range list.
 * 3. `FF FF FF FF "HapsGPIR"` precedes the scan data; its length field is
 *    180 bytes further on, followed by a `"HapsScan"` tag.
 *
 * Each scan is a 16-byte header naming a segment, then one little-endian
 * f32 intensity per m/z of that segment. Every intensity is one record.
 */

import { InficonError } from "../errors";
import { ascii, startsWith, viewOf } from "../io/bytes";
import type { ReadBuffer } from "../io/read-buffer";
import type { InficonRecord } from "../types";
import { AbstractParser, END } from "./abstract-parser";
import type { ParseOutcome } from "./abstract-parser";

const INFICON_MAGIC = new Uint8Array([0x04, 0x03, 0x02, 0x01]);
const METHOD_MARKER = new Uint8Array([
  0xff, 0xff, 0xff, 0xff,
  ...new Array<number>(32).fill(0),
  0xf6, 0xff, 0xff, 0xff,
  0x00, 0x00, 0x00, 0x00,
]);
const SCAN_DATA_MARKER = new Uint8Array([0xff, 0xff, 0xff, 0xff, ...ascii("HapsGPIR")]);
const SCAN_DATA_TAG = ascii("HapsScan");

const METHOD_MARKER_TO_SEGMENTS = 148;
const SEGMENT_HEADER_BYTES = 96;
const SCAN_MARKER_TO_LENGTH = 180;
const SCAN_HEADER_BYTES = 16;
const INTENSITY_BYTES = 4;

const MAX_SEGMENTS = 10_000;
const MAX_MZ_RANGES = 100_000;
const MAX_RAW_MZ = 4_000_000_000;
const MAX_RANGE_WIDTH = 200_000;
const RAW_MZ_STEP = 100;
const MZ_SCALE = 100;
const TIME_SCALE = 60_000;
const SINGLE_ION_MODE = 0;

const INFICON_FIELDS = ["time", "mz", "intensity"] as const;

interface InficonState {
  /** m/z values of each acquisition segment */
  readonly segments: readonly (readonly number[])[];
  /** Scan bytes still expected */
  dataLeft: number;
  /** Intensities left in the current scan */
  mzsLeft: number;
  segment: number;
  time: number;
  current: InficonRecord;
}

export class InficonParser extends AbstractParser<InficonRecord, InficonState> {
  readonly format = "Inficon";
  override readonly positional = true;

  initialize(buffer: ReadBuffer): InficonState {
    if (!startsWith(buffer.extract(4, "magic"), INFICON_MAGIC)) {
      throw new InficonError("Inficon file has bad magic bytes");
    }

    if (!buffer.seekPattern(METHOD_MARKER)) {
      throw new InficonError("Could not find m/z header list");
    }
    buffer.extract(METHOD_MARKER_TO_SEGMENTS, "method header");

    const segmentCount = readSetupUInt32(buffer, "segment count");
    if (segmentCount > MAX_SEGMENTS) {
      throw new InficonError("Inficon file has too many segments");
    }

    const segments: number[][] = [];
    for (let i = 0; i < segmentCount; i++) {
      buffer.extract(SEGMENT_HEADER_BYTES, "segment header");
      const rangeCount = readSetupUInt32(buffer, "m/z range count");
      if (rangeCount > MAX_MZ_RANGES) {
        throw new InficonError("Too many m/z ranges");
      }
      const mzs: number[] = [];
      for (let j = 0; j < rangeCount; j++) {
        readMzRange(buffer, mzs);
      }
      segments.push(mzs);
    }

    if (!buffer.seekPattern(SCAN_DATA_MARKER)) {
      throw new InficonError("Could not find start of scan data");
    }
    buffer.extract(SCAN_MARKER_TO_LENGTH, "scan data header");
    const dataLength = readSetupUInt32(buffer, "scan data length");
    buffer.extract(8, "scan data header");
    if (!startsWith(buffer.extract(SCAN_DATA_TAG.length, "scan data header"), SCAN_DATA_TAG)) {
      throw new InficonError("Data header was malformed");
    }
    buffer.extract(56, "scan data header");

    return {
      segments,
      dataLeft: dataLength,
      mzsLeft: 0,
      segment: 0,
      time: 0,
      current: { time: 0, mz: 0, intensity: 0 },
    };
  }

  fields(): readonly string[] {
    return INFICON_FIELDS;
  }

  parse(window: Uint8Array, atEof: boolean, state: InficonState): ParseOutcome {
    if (state.dataLeft === 0) {
      if (window.length > 0) {
        this.warn(`Ignoring ${window.length} bytes after the declared scan data`);
      }
      return END;
    }

    const view = viewOf(window);
    let offset = 0;
    let mzsLeft = state.mzsLeft;
    let segment = state.segment;
    let time = state.time;

    if (mzsLeft === 0) {
      if (window.length < SCAN_HEADER_BYTES) return this.needMore(atEof, "scan header");
      time = view.getInt32(4, true) / TIME_SCALE;
      const intensityCount = view.getUint16(10, true);
      segment = view.getUint16(14, true) >> 4;

      const mzs = state.segments[segment];
      if (mzs === undefined) {
        throw new InficonError(`Invalid segment number (${segment}) specified`);
      }
      if (intensityCount !== mzs.length) {
        throw new InficonError(
          `Number of intensities (${intensityCount}) doesn't match number of mzs (${mzs.length})`
        );
      }
      mzsLeft = intensityCount;
      offset = SCAN_HEADER_BYTES;
    }

    if (window.length < offset + INTENSITY_BYTES) return this.needMore(atEof, "intensity");
    const intensity = view.getFloat32(offset, true);
    const consumed = offset + INTENSITY_BYTES;

    const mzs = state.segments[segment] ?? [];
    const mz = mzsLeft > 0 && mzsLeft <= mzs.length ? mzs[mzs.length - mzsLeft] : undefined;
    if (mz === undefined) {
      throw new InficonError("Invalid m/z segment");
    }

    state.current = { time, mz, intensity };
    state.time = time;
    state.segment = segment;
    state.mzsLeft = mzsLeft - 1;
    state.dataLeft = Math.max(0, state.dataLeft - consumed);
    return this.record(consumed);
  }

  get(_window: Uint8Array, state: InficonState): InficonRecord {
    return state.current;
  }
}

function readSetupUInt32(buffer: ReadBuffer, section: string): number {
  return viewOf(buffer.extract(4, section)).getUint32(0, true);
}

/**
 * Read one 32-byte m/z range entry and append the m/z values it covers
 */
function readMzRange(buffer: ReadBuffer, mzs: number[]): void {
  const entry = viewOf(buffer.extract(32, "m/z range"));
  const start = entry.getUint32(0, true);
  const end = entry.getUint32(4, true);
  if (end > MAX_RAW_MZ) {
    throw new InficonError("End of m/z range is invalid");
  }
  // bytes 8..24 hold the dwell time and three unidentified values
  const acquisitionType = entry.getUint32(24, true);

  if (acquisitionType === SINGLE_ION_MODE) {
    mzs.push(start / MZ_SCALE);
    return;
  }
  if (start >= end || end - start >= MAX_RANGE_WIDTH) {
    throw new InficonError("m/z range is too big or invalid");
  }
  for (let raw = start; raw < end + 1; raw += RAW_MZ_STEP) {
    mzs.push(raw / MZ_SCALE);
  }
}
