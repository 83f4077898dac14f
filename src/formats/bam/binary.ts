/**
 * Binary field decoding for BAM alignments
 *
 * - Little-endian integer reads with bounds checking
 * - 4-bit packed nucleotide sequences
 * - Packed CIGAR operations
 * - Phred quality bytes
 */

import { BamError } from "../../errors";

const PHRED_OFFSET = 33;
const UNAVAILABLE_QUALITY = 255;
const BYTES_PER_CIGAR_OP = 4;

// BAM sequence encoding lookup table
const SEQ_DECODER = "=ACMGRSVTWYHKDBN";

// CIGAR operation lookup table
const CIGAR_OPS = "MIDNSHP=X";

function checkBounds(view: DataView, offset: number, size: number, kind: string): void {
  if (offset < 0 || offset + size > view.byteLength) {
    throw new BamError(
      `Cannot read ${kind} at offset ${offset}: buffer too small (${view.byteLength} bytes)`,
      "binary"
    );
  }
}

/**
 * Read a 32-bit signed integer in little-endian format
 * @throws {BamError} If offset is out of bounds
 */
export function readInt32LE(view: DataView, offset: number): number {
  checkBounds(view, offset, 4, "int32");
  return view.getInt32(offset, true);
}

/**
 * Read a 32-bit unsigned integer in little-endian format
 * @throws {BamError} If offset is out of bounds
 */
export function readUInt32LE(view: DataView, offset: number): number {
  checkBounds(view, offset, 4, "uint32");
  return view.getUint32(offset, true);
}

/**
 * Read a 16-bit unsigned integer in little-endian format
 * @throws {BamError} If offset is out of bounds
 */
export function readUInt16LE(view: DataView, offset: number): number {
  checkBounds(view, offset, 2, "uint16");
  return view.getUint16(offset, true);
}

/**
 * Read an 8-bit unsigned integer
 * @throws {BamError} If offset is out of bounds
 */
export function readUInt8(view: DataView, offset: number): number {
  checkBounds(view, offset, 1, "uint8");
  return view.getUint8(offset);
}

/**
 * Decode a 4-bit packed sequence, high nibble first
 *
 * @param packed - At least `ceil(length / 2)` bytes
 * @param length - Number of bases
 *
 * @example
 * ```typescript
 * decodeSequence(new Uint8Array([0x12, 0x48]), 4); // "ACGT"
 * ```
 */
export function decodeSequence(packed: Uint8Array, length: number): string {
  if (length === 0) return "";

  const bytesNeeded = Math.ceil(length / 2);
  if (packed.length < bytesNeeded) {
    throw new BamError(
      `Buffer too small for sequence: need ${bytesNeeded} bytes, have ${packed.length}`,
      "seq"
    );
  }

  const chars = new Array<string>(length);
  for (let i = 0; i < length; i++) {
    const byte = packed[i >> 1] ?? 0;
    const nibble = i % 2 === 0 ? byte >> 4 : byte & 0xf;
    chars[i] = SEQ_DECODER.charAt(nibble);
  }
  return chars.join("");
}

/**
 * Render packed CIGAR operations as text
 *
 * Each operation is a little-endian u32 `length << 4 | op`.
 *
 * @throws {BamError} For an operation code outside `MIDNSHP=X`
 */
export function decodeCigar(view: DataView, offset: number, count: number): string {
  let cigar = "";
  for (let i = 0; i < count; i++) {
    const packed = readUInt32LE(view, offset + i * BYTES_PER_CIGAR_OP);
    // four bits, not three: `X` is op code 8
    const op = packed & 0xf;
    if (op >= CIGAR_OPS.length) {
      throw new BamError(`Invalid CIGAR operation code ${op}`, "cigar");
    }
    cigar += `${packed >>> 4}${CIGAR_OPS.charAt(op)}`;
  }
  return cigar;
}

/**
 * Phred+33 text for raw quality bytes; a leading 255 marks them absent
 */
export function decodeQuality(raw: Uint8Array): string {
  if (raw.length === 0 || raw[0] === UNAVAILABLE_QUALITY) return "";
  let quality = "";
  for (const score of raw) {
    quality += String.fromCharCode(score + PHRED_OFFSET);
  }
  return quality;
}

/**
 * Bytes of a length-prefixed name with one trailing NUL removed
 */
export function stripNul(bytes: Uint8Array): Uint8Array {
  return bytes.length > 0 && bytes[bytes.length - 1] === 0 ? bytes.subarray(0, bytes.length - 1) : bytes;
}
