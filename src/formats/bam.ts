/**
 * BAM decoder
 *
 * Expects the decompressed stream (BGZF is unwrapped by the gzip codec).
 * Setup reads the magic, the header text and the reference table; every
 * record afterwards is a length-prefixed alignment block:
 *
 * | offset | size | field |
 * |--------|------|-------|
 * | 0 | 4 | block size (excluding itself) |
 * | 4 | 4 | reference id |
 * | 8 | 4 | position |
 * | 12 | 1 | query name length |
 * | 13 | 1 | mapping quality |
 * | 14 | 2 | index bin |
 * | 16 | 2 | CIGAR operation count |
 * | 18 | 2 | flag |
 * | 20 | 4 | sequence length |
 * | 24 | 4 | mate reference id |
 * | 28 | 4 | mate position |
 * | 32 | 4 | template length |
 * | 36 | ... | query name, CIGAR, sequence, quality, tags |
 *
 * Optional tags are not decoded.
 */

import { BamError } from "../errors";
import { decodeText, startsWith, viewOf } from "../io/bytes";
import type { ReadBuffer } from "../io/read-buffer";
import type { AlignmentRecord, ReaderMetadata, ReferenceSequence } from "../types";
import { AbstractParser, END } from "./abstract-parser";
import type { ParseOutcome } from "./abstract-parser";
import {
  decodeCigar,
  decodeQuality,
  decodeSequence,
  readInt32LE,
  readUInt16LE,
  readUInt32LE,
  readUInt8,
  stripNul,
} from "./bam/binary";
import { ALIGNMENT_FIELDS } from "./sam";

const BAM_MAGIC = new Uint8Array([0x42, 0x41, 0x4d, 0x01]); // "BAM\1"
const BLOCK_SIZE_BYTES = 4;
const MIN_ALIGNMENT_BLOCK_SIZE = 32;
const FIXED_FIELDS_END = BLOCK_SIZE_BYTES + MIN_ALIGNMENT_BLOCK_SIZE;
const MAX_ALIGNMENT_BLOCK_SIZE = 256 * 1024 * 1024;
const UNMAPPED_REFERENCE = -1;
const UNAVAILABLE_POSITION = -1;
const UNAVAILABLE_MAPQ = 255;

interface BamState {
  readonly header: string;
  readonly references: readonly ReferenceSequence[];
  blockEnd: number;
}

export class BamParser extends AbstractParser<AlignmentRecord, BamState> {
  readonly format = "BAM";
  override readonly positional = true;

  initialize(buffer: ReadBuffer): BamState {
    if (!startsWith(buffer.extract(4, "magic"), BAM_MAGIC)) {
      throw new BamError("Not a valid BAM file", "magic");
    }

    const textLength = this.readSetupUInt32(buffer, "header length");
    const header = decodeText(buffer.extract(textLength, "header"), this.format, "header");

    const referenceCount = this.readSetupUInt32(buffer, "reference count");
    const references: ReferenceSequence[] = [];
    for (let i = 0; i < referenceCount; i++) {
      const nameLength = this.readSetupUInt32(buffer, "reference name length");
      const name = decodeText(stripNul(buffer.extract(nameLength, "reference name")), this.format, "reference name");
      const length = this.readSetupUInt32(buffer, "reference length");
      references.push({ name, length });
    }

    return { header, references, blockEnd: 0 };
  }

  fields(): readonly string[] {
    return ALIGNMENT_FIELDS;
  }

  override metadata(state: BamState): ReaderMetadata {
    return { header: state.header, references: state.references };
  }

  parse(window: Uint8Array, atEof: boolean, state: BamState): ParseOutcome {
    if (window.length === 0) return atEof ? END : this.needMore(atEof, "record length");
    if (window.length < BLOCK_SIZE_BYTES) return this.needMore(atEof, "record length");

    const blockSize = readUInt32LE(viewOf(window), 0);
    if (blockSize < MIN_ALIGNMENT_BLOCK_SIZE) {
      throw new BamError("Record is unexpectedly short", "block_size");
    }
    if (blockSize > MAX_ALIGNMENT_BLOCK_SIZE) {
      throw new BamError(`Record length ${blockSize} exceeds the ${MAX_ALIGNMENT_BLOCK_SIZE} byte limit`, "block_size");
    }
    const blockEnd = BLOCK_SIZE_BYTES + blockSize;
    if (window.length < blockEnd) return this.needMore(atEof, "record");

    state.blockEnd = blockEnd;
    return this.record(blockEnd);
  }

  get(window: Uint8Array, state: BamState): AlignmentRecord {
    const block = window.subarray(0, state.blockEnd);
    const view = viewOf(block);

    const refId = readInt32LE(view, 4);
    const pos = readInt32LE(view, 8);
    const nameLength = readUInt8(view, 12);
    const mapq = readUInt8(view, 13);
    const cigarCount = readUInt16LE(view, 16);
    const flag = readUInt16LE(view, 18);
    const seqLength = readUInt32LE(view, 20);
    const nextRefId = readInt32LE(view, 24);
    const nextPos = readInt32LE(view, 28);
    const tlen = readInt32LE(view, 32);

    let offset = FIXED_FIELDS_END;
    if (offset + nameLength > block.length) {
      throw new BamError("Record ended abruptly while reading the query name", "read_name");
    }
    const queryName = decodeText(stripNul(block.subarray(offset, offset + nameLength)), this.format, "query name");
    offset += nameLength;

    if (offset + cigarCount * 4 > block.length) {
      throw new BamError("Record ended abruptly while reading CIGAR operations", "cigar");
    }
    const cigar = decodeCigar(view, offset, cigarCount);
    offset += cigarCount * 4;

    const packedLength = Math.ceil(seqLength / 2);
    if (offset + packedLength + seqLength > block.length) {
      throw new BamError("Record ended abruptly while reading the sequence", "seq");
    }
    const seq = decodeSequence(block.subarray(offset, offset + packedLength), seqLength);
    offset += packedLength;
    const qual = decodeQuality(block.subarray(offset, offset + seqLength));

    return {
      queryName,
      flag,
      refName: this.referenceName(state, refId, "Invalid reference sequence ID"),
      pos: pos === UNAVAILABLE_POSITION ? null : pos,
      mapq: mapq === UNAVAILABLE_MAPQ ? null : mapq,
      cigar,
      rnext: this.referenceName(state, nextRefId, "Invalid next reference sequence ID"),
      pnext: nextPos === UNAVAILABLE_POSITION ? null : nextPos,
      tlen,
      seq,
      qual,
      extra: "",
    };
  }

  private referenceName(state: BamState, id: number, message: string): string {
    if (id === UNMAPPED_REFERENCE) return "";
    const reference = id >= 0 ? state.references[id] : undefined;
    if (reference === undefined) throw new BamError(`${message} ${id}`, "refID");
    return reference.name;
  }

  private readSetupUInt32(buffer: ReadBuffer, section: string): number {
    return readUInt32LE(viewOf(buffer.extract(4, section)), 0);
  }
}
