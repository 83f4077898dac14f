/**
 * Blocking byte sources
 *
 * A `ByteSource` is the only thing a reader pulls bytes from. Reads are
 * synchronous; a read returning 0 means the source is exhausted.
 */

import { closeSync, openSync, readSync } from "node:fs";
import { SourceError } from "../errors";

export interface ByteSource {
  /**
   * Copy up to `into.length` bytes into `into`
   *
   * @returns Number of bytes copied; 0 only once the source is exhausted
   */
  read(into: Uint8Array): number;
  close?(): void;
}

/**
 * Source over bytes already in memory
 */
export class BufferSource implements ByteSource {
  private offset = 0;

  constructor(private readonly data: Uint8Array) {}

  read(into: Uint8Array): number {
    const count = Math.min(into.length, this.data.length - this.offset);
    if (count <= 0) return 0;
    into.set(this.data.subarray(this.offset, this.offset + count));
    this.offset += count;
    return count;
  }
}

/**
 * Source over an iterable of chunks, handed out no larger than they arrived
 *
 * Useful for replaying data in small pieces; empty chunks are skipped.
 */
export class ChunkedSource implements ByteSource {
  private readonly chunks: Iterator<Uint8Array>;
  private current: Uint8Array = new Uint8Array(0);
  private offset = 0;
  private done = false;

  constructor(chunks: Iterable<Uint8Array>) {
    this.chunks = chunks[Symbol.iterator]();
  }

  /**
   * Split `data` into chunks of `size` bytes
   */
  static of(data: Uint8Array, size: number): ChunkedSource {
    const chunks: Uint8Array[] = [];
    for (let start = 0; start < data.length; start += size) {
      chunks.push(data.subarray(start, start + size));
    }
    return new ChunkedSource(chunks);
  }

  read(into: Uint8Array): number {
    if (into.length === 0) return 0;
    while (this.offset >= this.current.length) {
      if (this.done) return 0;
      const next = this.chunks.next();
      if (next.done === true) {
        this.done = true;
        return 0;
      }
      this.current = next.value;
      this.offset = 0;
    }
    const count = Math.min(into.length, this.current.length - this.offset);
    into.set(this.current.subarray(this.offset, this.offset + count));
    this.offset += count;
    return count;
  }
}

/**
 * Blocking reads from a file path or an already open descriptor
 */
export class FileSource implements ByteSource {
  private closed = false;

  private constructor(
    private readonly fd: number,
    private readonly path: string | undefined,
    private readonly ownsDescriptor: boolean
  ) {}

  static open(path: string): FileSource {
    try {
      return new FileSource(openSync(path, "r"), path, true);
    } catch (error) {
      throw SourceError.fromSystemError("open", path, error);
    }
  }

  /**
   * Wrap a descriptor the caller keeps ownership of
   */
  static fromDescriptor(fd: number): FileSource {
    return new FileSource(fd, undefined, false);
  }

  read(into: Uint8Array): number {
    if (this.closed || into.length === 0) return 0;
    try {
      return readSync(this.fd, into, 0, into.length, null);
    } catch (error) {
      throw SourceError.fromSystemError("read", this.path, error);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (!this.ownsDescriptor) return;
    try {
      closeSync(this.fd);
    } catch (error) {
      throw SourceError.fromSystemError("close", this.path, error);
    }
  }
}

/**
 * Source that can look at its leading bytes before handing them out
 */
export class PeekableSource implements ByteSource {
  private prefix: Uint8Array = new Uint8Array(0);
  private offset = 0;
  private exhausted = false;

  constructor(private readonly inner: ByteSource) {}

  /**
   * Leading bytes of the stream, up to `length` of them
   *
   * Reads from the wrapped source until `length` bytes are held or it is
   * exhausted. Peeked bytes are replayed by later reads.
   */
  peek(length: number): Uint8Array {
    while (this.prefix.length < length && !this.exhausted) {
      const chunk = new Uint8Array(length - this.prefix.length);
      const count = this.inner.read(chunk);
      if (count === 0) {
        this.exhausted = true;
        break;
      }
      const grown = new Uint8Array(this.prefix.length + count);
      grown.set(this.prefix);
      grown.set(chunk.subarray(0, count), this.prefix.length);
      this.prefix = grown;
    }
    return this.prefix.subarray(0, length);
  }

  read(into: Uint8Array): number {
    if (this.offset < this.prefix.length) {
      const count = Math.min(into.length, this.prefix.length - this.offset);
      into.set(this.prefix.subarray(this.offset, this.offset + count));
      this.offset += count;
      return count;
    }
    if (this.exhausted) return 0;
    return this.inner.read(into);
  }

  close(): void {
    this.inner.close?.();
  }
}
