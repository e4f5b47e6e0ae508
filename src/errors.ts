/**
 * Error handling for track ingestion
 *
 * Every failure surfaced by this library is a TrackfillError subclass so
 * callers can branch on the class (or on `code`) without string matching.
 */

/**
 * File operations that can fail with an IOError
 */
export type FileOperation = "open" | "read" | "write" | "close" | "stat";

/**
 * Base error class for all trackfill errors
 */
export class TrackfillError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "TrackfillError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class IOError extends TrackfillError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: FileOperation,
    public readonly systemError?: unknown,
    context?: string,
    code = "IO_ERROR"
  ) {
    super(message, code, undefined, context);
    this.name = "IOError";
  }

  /**
   * Map an error raised by the file system layer to NotFoundError or IOError
   */
  static fromSystemError(operation: FileOperation, filePath: string, systemError: unknown): IOError {
    if (systemError instanceof IOError) {
      return systemError;
    }

    const errorMessage = describeSystemError(systemError);
    if (isNotFound(systemError)) {
      return new NotFoundError(filePath, operation, systemError);
    }

    const suggestion = IOError.getSuggestionForSystemError(errorMessage);
    return new IOError(
      `${operation} operation failed for '${filePath}': ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("eacces") || msg.includes("permission")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Close unused file handles or increase system limits";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nPath: ${this.filePath}`;
    msg += `\nOperation: ${this.operation}`;
    return msg;
  }
}

/**
 * The path did not exist when it was opened or inspected
 */
export class NotFoundError extends IOError {
  constructor(filePath: string, operation: FileOperation, systemError?: unknown) {
    super(
      `File not found: '${filePath}'`,
      filePath,
      operation,
      systemError,
      "Check that the file path is correct and the file exists",
      "NOT_FOUND"
    );
    this.name = "NotFoundError";
  }
}

/**
 * Gzip encode/decode failures on an open stream handle
 */
export class CompressionError extends IOError {
  constructor(
    message: string,
    filePath: string,
    operation: "read" | "write" | "close",
    public readonly bytesProcessed?: number,
    systemError?: unknown
  ) {
    super(message, filePath, operation, systemError, undefined, "COMPRESSION_ERROR");
    this.name = "CompressionError";
  }

  static fromCodecError(
    filePath: string,
    operation: "read" | "write" | "close",
    codecError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = describeSystemError(codecError);
    return new CompressionError(
      `gzip ${operation === "read" ? "decompression" : "compression"} failed for '${filePath}': ${errorMessage}`,
      filePath,
      operation,
      bytesProcessed,
      codecError
    );
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
 * Parsing errors for record-stream input
 */
export class ParseError extends TrackfillError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string,
    code = "PARSE_ERROR"
  ) {
    super(message, code, lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Record framing violations: body before the first marker, empty labels,
 * over-long lines, or no records where some were required
 */
export class MalformedInputError extends ParseError {
  constructor(message: string, format: string, lineNumber?: number, context?: string) {
    super(message, format, lineNumber, context, "MALFORMED_INPUT");
    this.name = "MalformedInputError";
  }
}

/**
 * A cursor or framer was advanced after it had already reported its end
 */
export class StreamExhaustedError extends ParseError {
  constructor(format: string) {
    super(`${format} record stream is already exhausted`, format, undefined, undefined, "STREAM_EXHAUSTED");
    this.name = "StreamExhaustedError";
  }
}

/**
 * Validation errors for arguments and array shapes
 */
export class ValidationError extends TrackfillError {
  constructor(message: string, context?: string, code = "VALIDATION_ERROR") {
    super(message, code, undefined, context);
    this.name = "ValidationError";
  }
}

/**
 * A shape, dtype, scalar or option value that cannot be used
 */
export class InvalidArgumentError extends ValidationError {
  constructor(message: string, context?: string) {
    super(message, context, "INVALID_ARGUMENT");
    this.name = "InvalidArgumentError";
  }
}

/**
 * A dimension disagreed with the one already established in an accumulation session
 */
export class InconsistentShapeError extends ValidationError {
  constructor(
    message: string,
    public readonly expected: number | readonly number[],
    public readonly actual: number | readonly number[]
  ) {
    super(message, `Expected: ${formatDimension(expected)}, Actual: ${formatDimension(actual)}`, "INCONSISTENT_SHAPE");
    this.name = "InconsistentShapeError";
  }

  /**
   * Observation count of a new batch differs from the session's count
   */
  static forObservationCount(expected: number, actual: number): InconsistentShapeError {
    return new InconsistentShapeError(
      `Observation count mismatch: session has ${expected} columns, batch has ${actual}`,
      expected,
      actual
    );
  }
}

function formatDimension(value: number | readonly number[]): string {
  return typeof value === "number" ? String(value) : `(${value.join(", ")})`;
}

/**
 * Message of an Error or of a platform error object carrying `message`
 */
function describeSystemError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}

/**
 * Recognize "not found" from both Effect platform errors and raw Node errors
 */
function isNotFound(error: unknown): boolean {
  if (typeof error !== "object" || error === null) {
    return false;
  }
  if ("reason" in error && error.reason === "NotFound") {
    return true;
  }
  return "code" in error && error.code === "ENOENT";
}
