/**
 * Thrown errors
 *
 * A load throws only when it cannot go on at all: the source cannot be
 * read, the destination cannot be written, the options are wrong or the
 * caller aborted. Anything wrong with a single line becomes a diagnostic
 * (see diagnostics.ts).
 */

type FileOperation = "read" | "write" | "stat";

export class IntervalKitError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "IntervalKitError";
  }

  /**
   * `Name: message (line N)` followed by a `Context:` line when one was given
   */
  override toString(): string {
    const location = this.lineNumber === undefined ? "" : ` (line ${this.lineNumber})`;
    const head = `${this.name}: ${this.message}${location}`;
    return this.context ? `${head}\nContext: ${this.context}` : head;
  }
}

/**
 * Rejected options, configuration or call arguments
 */
export class ValidationError extends IntervalKitError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * A load of one format stopped part way
 */
export class ParseError extends IntervalKitError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

export class BedError extends ParseError {
  constructor(
    message: string,
    public readonly sequenceName?: string,
    public readonly start?: number,
    public readonly end?: number,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "BED", lineNumber, context);
    this.name = "BedError";
  }
}

export class GffError extends ParseError {
  constructor(
    message: string,
    public readonly sequenceId?: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "GFF3", lineNumber, context);
    this.name = "GffError";
  }
}

/**
 * A conversion was asked for that cannot be attempted
 */
export class ConversionError extends IntervalKitError {
  constructor(
    message: string,
    public readonly sourceFormat: string,
    public readonly targetFormat: string,
    context?: string
  ) {
    super(message, "CONVERSION_ERROR", undefined, context);
    this.name = "ConversionError";
  }
}

// Matched against the lowercased platform message, first hit wins
const FILE_ERROR_HINTS: ReadonlyArray<readonly [readonly string[], string]> = [
  [["enoent", "no such file", "notfound"], "Check that the file path is correct and the file exists"],
  [["eacces", "permission denied"], "Check file permissions"],
  [["eisdir", "is a directory"], "Path points to a directory, not a file"],
  [["enospc", "no space left"], "Free up disk space or use a different location"],
];

function hintFor(reason: string): string | undefined {
  const lowered = reason.toLowerCase();
  const match = FILE_ERROR_HINTS.find(([needles]) => needles.some((needle) => lowered.includes(needle)));
  return match?.[1];
}

/**
 * A file system call on `filePath` failed
 */
export class FileError extends IntervalKitError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: FileOperation,
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Wrap a platform failure, appending a hint for the common errno cases
   *
   * @example
   * ```typescript
   * FileError.fromSystemError("read", "a.bed", new Error("ENOENT: no such file")).message;
   * // "read operation failed for 'a.bed': ENOENT: no such file. Check that the file path is correct and the file exists"
   * ```
   */
  static fromSystemError(operation: FileOperation, filePath: string, cause: unknown): FileError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const hint = hintFor(reason);
    const message = `${operation} operation failed for '${filePath}': ${reason}`;
    return new FileError(
      hint === undefined ? message : `${message}. ${hint}`,
      filePath,
      operation,
      cause,
      `System error: ${reason}`
    );
  }

  override toString(): string {
    const base = super.toString();
    const cause = this.systemError;
    return cause instanceof Error ? `${base}\nSystem Error: ${cause.name}: ${cause.message}` : base;
  }
}

/**
 * A byte stream failed while being decoded into lines
 */
export class StreamError extends IntervalKitError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Sampled lines matched neither BED nor GFF3
 */
export class FormatDetectionError extends IntervalKitError {
  constructor(
    message: string,
    public readonly confidence: number,
    context?: string
  ) {
    super(message, "FORMAT_DETECTION_ERROR", undefined, context);
    this.name = "FormatDetectionError";
  }
}
