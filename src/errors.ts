/**
 * Error handling for record readers
 *
 * Every failure surfaced by a reader is a `RecstreamError` subclass with a
 * stable `code`. Parse failures carry the format that raised them and, for
 * binary formats, the byte offset and record number where the failing
 * record started.
 */

/**
 * Base error class for all recstream errors
 */
export class RecstreamError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "RecstreamError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for rejected options or arguments
 */
export class ValidationError extends RecstreamError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

export interface ParseErrorDetails {
  readonly byteOffset?: number;
  readonly recordIndex?: number;
  /** True when the input ended in the middle of a record */
  readonly incomplete?: boolean;
  readonly context?: string;
}

/**
 * Parsing errors for format-specific issues
 *
 * `reason` is the decoder's message; `message` additionally names the
 * position once one is attached with {@link ParseError.withPosition}.
 */
export class ParseError extends RecstreamError {
  readonly reason: string;
  readonly byteOffset: number | undefined;
  readonly recordIndex: number | undefined;
  readonly incomplete: boolean;

  constructor(
    message: string,
    public readonly format: string,
    details: ParseErrorDetails = {}
  ) {
    super(formatPosition(message, details), "PARSE_ERROR", details.context);
    this.name = "ParseError";
    this.reason = message;
    this.byteOffset = details.byteOffset;
    this.recordIndex = details.recordIndex;
    this.incomplete = details.incomplete ?? false;
  }

  get positioned(): boolean {
    return this.byteOffset !== undefined;
  }

  /**
   * Copy of this error pinned to the record that failed
   *
   * @param byteOffset - Offset of the record's first byte in the decoded stream
   * @param recordIndex - 1-based number of the failing record
   */
  withPosition(byteOffset: number, recordIndex: number): ParseError {
    return this.copyWith({
      byteOffset,
      recordIndex,
      incomplete: this.incomplete,
      ...(this.context !== undefined && { context: this.context }),
    });
  }

  /** Same error class and reason with new details */
  protected copyWith(details: ParseErrorDetails): ParseError {
    return new ParseError(this.reason, this.format, details);
  }
}

/**
 * BAM decoding error with the field being read when it failed
 */
export class BamError extends ParseError {
  constructor(
    message: string,
    public readonly field?: string,
    details: ParseErrorDetails = {}
  ) {
    super(message, "BAM", details);
    this.name = "BamError";
  }

  protected override copyWith(details: ParseErrorDetails): ParseError {
    return new BamError(this.reason, this.field, details);
  }
}

/**
 * Inficon Hapsite decoding error
 */
export class InficonError extends ParseError {
  constructor(message: string, details: ParseErrorDetails = {}) {
    super(message, "Inficon", details);
    this.name = "InficonError";
  }

  protected override copyWith(details: ParseErrorDetails): ParseError {
    return new InficonError(this.reason, details);
  }
}

export type CompressionFormat = "gzip" | "bzip" | "lzma" | "zstd";

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends RecstreamError {
  constructor(
    message: string,
    public readonly format: CompressionFormat,
    public readonly operation: "load" | "decompress",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from a codec failure
   */
  static fromSystemError(
    format: CompressionFormat,
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(errorMessage);

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForCompressionError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("unexpected eof") || msg.includes("truncated") || msg.includes("unexpected end")) {
      return "File appears to be truncated or incomplete";
    }
    if (msg.includes("crc") || msg.includes("checksum")) {
      return "Data integrity check failed - file may be corrupted";
    }
    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }
    return msg;
  }
}

/**
 * Failures of the underlying byte source (opening or reading a file)
 */
export class SourceError extends RecstreamError {
  constructor(
    message: string,
    public readonly operation: "open" | "read" | "close",
    public readonly path?: string,
    context?: string
  ) {
    super(message, "SOURCE_ERROR", context);
    this.name = "SourceError";
  }

  static fromSystemError(
    operation: SourceError["operation"],
    path: string | undefined,
    systemError: unknown
  ): SourceError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const target = path !== undefined ? ` ${path}` : "";
    return new SourceError(
      `Failed to ${operation}${target}: ${errorMessage}`,
      operation,
      path,
      `System error: ${errorMessage}`
    );
  }
}

/**
 * A reader was requested for a format that has no decoder
 */
export class UnsupportedFormatError extends RecstreamError {
  constructor(public readonly parserName: string) {
    super(`No parser available for ${parserName}`, "UNSUPPORTED_FORMAT");
    this.name = "UnsupportedFormatError";
  }
}

function formatPosition(message: string, details: ParseErrorDetails): string {
  if (details.byteOffset === undefined) return message;
  const record = details.recordIndex !== undefined ? `, record ${details.recordIndex}` : "";
  return `${message} (byte ${details.byteOffset}${record})`;
}
