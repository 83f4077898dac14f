/**
 * Incremental parse protocol shared by every decoder
 *
 * A decoder never reads from the source itself. It looks at the buffered
 * window and answers with a {@link ParseOutcome}: a complete record and its
 * length, a request for more bytes, or the end of the stream. The
 * {@link RecordDriver} does the refilling and consuming around it.
 */

import { ParseError } from "../errors";
import type { ReadBuffer } from "../io/read-buffer";
import type { ReaderMetadata } from "../types";

export type ParseOutcome =
  | { readonly kind: "incomplete"; readonly section: string }
  | { readonly kind: "record"; readonly consumed: number }
  | { readonly kind: "end" };

export const END: ParseOutcome = { kind: "end" };

export interface ParserOptions {
  /** Sink for non-fatal oddities; defaults to console.warn */
  onWarning?: (message: string) => void;
}

export interface RecordParser<TRecord, TState> {
  /** Format name used in errors and warnings */
  readonly format: string;
  /** Errors gain the byte offset and record number of the failing record */
  readonly positional: boolean;

  /** One-time setup: read headers and build the decoder state */
  initialize(buffer: ReadBuffer): TState;
  /** Field names of the records, in record key order */
  fields(state: TState): readonly string[];
  metadata(state: TState): ReaderMetadata;
  parse(window: Uint8Array, atEof: boolean, state: TState): ParseOutcome;
  /** Build the record `parse` just located at the start of `window` */
  get(window: Uint8Array, state: TState): TRecord;
}

/**
 * Base class holding option defaults and the outcome helpers
 *
 * @template TRecord - Record type the decoder produces
 * @template TState - Mutable per-stream decoder state
 */
export abstract class AbstractParser<TRecord, TState> implements RecordParser<TRecord, TState> {
  protected readonly options: Required<ParserOptions>;

  abstract readonly format: string;
  readonly positional: boolean = false;

  constructor(options: ParserOptions = {}) {
    const defaults: Required<ParserOptions> = {
      onWarning: (warning: string): void => {
        console.warn(`${this.format} Warning: ${warning}`);
      },
    };
    this.options = { ...defaults, ...dropUndefined(options) };
  }

  abstract initialize(buffer: ReadBuffer): TState;
  abstract fields(state: TState): readonly string[];
  abstract parse(window: Uint8Array, atEof: boolean, state: TState): ParseOutcome;
  abstract get(window: Uint8Array, state: TState): TRecord;

  metadata(_state: TState): ReaderMetadata {
    return {};
  }

  protected record(consumed: number): ParseOutcome {
    return { kind: "record", consumed };
  }

  /**
   * Ask for more input, or fail when there is none left
   *
   * @throws {ParseError} When `atEof` is true
   */
  protected needMore(atEof: boolean, section: string): ParseOutcome {
    if (atEof) {
      throw this.error(`Record ended prematurely in ${section}`, { incomplete: true });
    }
    return { kind: "incomplete", section };
  }

  protected error(message: string, details: { incomplete?: boolean; context?: string } = {}): ParseError {
    return new ParseError(message, this.format, details);
  }

  protected warn(message: string): void {
    this.options.onWarning(message);
  }
}

function dropUndefined(options: ParserOptions): ParserOptions {
  return options.onWarning !== undefined ? { onWarning: options.onWarning } : {};
}

/**
 * Pulls records out of a buffer with a decoder
 *
 * After `end` every call returns null; after a failure every call rethrows
 * the same error.
 */
export class RecordDriver<TRecord, TState> implements RecordPuller<TRecord> {
  private finished = false;
  private failure: unknown = undefined;
  private failed = false;

  constructor(
    private readonly buffer: ReadBuffer,
    private readonly parser: RecordParser<TRecord, TState>,
    private readonly state: TState
  ) {}

  next(): TRecord | null {
    if (this.failed) throw this.failure;
    if (this.finished) return null;

    const byteOffset = this.buffer.absoluteOffset;
    const recordIndex = this.buffer.recordIndex + 1;
    try {
      for (;;) {
        const outcome = this.parser.parse(this.buffer.window, this.buffer.eof, this.state);
        switch (outcome.kind) {
          case "incomplete":
            if (this.buffer.eof) {
              throw new ParseError(`Record ended prematurely in ${outcome.section}`, this.parser.format, {
                incomplete: true,
              });
            }
            this.buffer.refill();
            break;
          case "end":
            this.finished = true;
            return null;
          case "record": {
            const record = this.parser.get(this.buffer.window, this.state);
            this.buffer.consume(outcome.consumed);
            this.buffer.markRecord();
            return record;
          }
        }
      }
    } catch (error) {
      const failure =
        this.parser.positional && error instanceof ParseError && !error.positioned
          ? error.withPosition(byteOffset, recordIndex)
          : error;
      this.failed = true;
      this.failure = failure;
      throw failure;
    }
  }
}

export interface RecordPuller<TRecord> {
  next(): TRecord | null;
}

/**
 * A decoder bound to its buffer, with the state type hidden
 */
export interface ParserSession<TRecord> {
  readonly format: string;
  readonly headers: readonly string[];
  readonly metadata: ReaderMetadata;
  readonly driver: RecordPuller<TRecord>;
}

/**
 * Run a decoder's setup against a buffer and return a ready session
 */
export function startSession<TRecord, TState>(
  parser: RecordParser<TRecord, TState>,
  buffer: ReadBuffer
): ParserSession<TRecord> {
  const state = parser.initialize(buffer);
  return {
    format: parser.format,
    headers: parser.fields(state),
    metadata: parser.metadata(state),
    driver: new RecordDriver(buffer, parser, state),
  };
}
