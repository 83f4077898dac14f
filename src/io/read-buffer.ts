/**
 * Streaming buffer between a byte source and a decoder
 *
 * Holds a contiguous window of not-yet-consumed bytes. Decoders look at the
 * window, report how many bytes a record used, and the buffer drops them.
 * `refill` is the only call that blocks on the source.
 */

import { ParseError } from "../errors";
import { DEFAULT_BUFFER_SIZE } from "../types";
import { findPattern } from "./bytes";
import type { ByteSource } from "./sources";

export class ReadBuffer {
  private store: Uint8Array;
  private start = 0;
  private end = 0;
  private reachedEof = false;
  private consumedBytes = 0;
  private records = 0;

  constructor(
    private readonly source: ByteSource,
    private readonly chunkSize: number = DEFAULT_BUFFER_SIZE,
    /** Format named in errors raised by {@link extract} */
    private readonly format = "input"
  ) {
    this.store = new Uint8Array(chunkSize);
  }

  /**
   * Unconsumed bytes, valid until the next `refill` or `consume`
   */
  get window(): Uint8Array {
    return this.store.subarray(this.start, this.end);
  }

  get length(): number {
    return this.end - this.start;
  }

  get isEmpty(): boolean {
    return this.end === this.start;
  }

  /** True once the source has reported that it is exhausted */
  get eof(): boolean {
    return this.reachedEof;
  }

  /** Bytes consumed since the start of the stream */
  get absoluteOffset(): number {
    return this.consumedBytes;
  }

  /** Records handed out so far */
  get recordIndex(): number {
    return this.records;
  }

  /**
   * Append one chunk from the source
   *
   * @returns Bytes appended; 0 once the source is exhausted
   */
  refill(): number {
    if (this.reachedEof) return 0;
    this.makeRoom(this.chunkSize);
    const count = this.source.read(this.store.subarray(this.end, this.end + this.chunkSize));
    if (count === 0) {
      this.reachedEof = true;
      return 0;
    }
    this.end += count;
    return count;
  }

  /**
   * Drop the first `count` bytes of the window and return them
   *
   * The returned bytes are borrowed from the buffer and must be used before
   * the next refill.
   */
  consume(count: number): Uint8Array {
    if (count < 0 || count > this.length) {
      throw new RangeError(`Cannot consume ${count} bytes from a window of ${this.length}`);
    }
    const taken = this.store.subarray(this.start, this.start + count);
    this.start += count;
    this.consumedBytes += count;
    return taken;
  }

  /**
   * Refill until at least `count` bytes are buffered
   *
   * @returns False when the source ran out first
   */
  reserve(count: number): boolean {
    while (this.length < count) {
      if (this.refill() === 0) return false;
    }
    return true;
  }

  /**
   * Discard bytes until `needle` starts the window
   *
   * At end of input everything but a possible partial match is discarded.
   * Discarded bytes are passed to `onDiscard` when given.
   *
   * @returns Whether the needle was found
   */
  seekPattern(needle: Uint8Array, onDiscard?: (skipped: Uint8Array) => void): boolean {
    for (;;) {
      const found = findPattern(this.window, needle);
      if (found >= 0) {
        this.discard(found, onDiscard);
        return true;
      }
      const keep = Math.min(this.length, needle.length - 1);
      this.discard(this.length - keep, onDiscard);
      if (this.refill() === 0) return false;
    }
  }

  /**
   * Take exactly `count` bytes, failing if the input ends first
   *
   * @param section - Part of the file being read, named in the error
   */
  extract(count: number, section: string): Uint8Array {
    if (!this.reserve(count)) {
      throw new ParseError(`Record ended prematurely in ${section}`, this.format, {
        incomplete: true,
      });
    }
    return this.consume(count);
  }

  markRecord(): void {
    this.records += 1;
  }

  private discard(count: number, onDiscard?: (skipped: Uint8Array) => void): void {
    const skipped = this.consume(count);
    if (onDiscard !== undefined && skipped.length > 0) onDiscard(skipped);
  }

  /**
   * Guarantee `extra` free bytes after the window, compacting or growing
   */
  private makeRoom(extra: number): void {
    if (this.store.length - this.end >= extra) return;
    const live = this.length;
    if (live + extra <= this.store.length) {
      this.store.copyWithin(0, this.start, this.end);
    } else {
      const grown = new Uint8Array(Math.max(this.store.length * 2, live + extra));
      grown.set(this.window);
      this.store = grown;
    }
    this.start = 0;
    this.end = live;
  }
}
