/**
 * Abstract base parser for line-oriented interval formats
 *
 * Owns everything BED and GFF3 loading have in common: option defaults,
 * AbortSignal handling, line classification, header collection, diagnostic
 * reporting and appending finished records to the output stream. A format
 * supplies only the record builder for a split data line.
 */

import { type } from "arktype";
import { DiagnosticLog, type Diagnostic, type FieldDefect } from "../diagnostics";
import { ValidationError, type ParseError } from "../errors";
import { createStream, type FileReaderOptions } from "../io/file-reader";
import { readLines } from "../io/stream-utils";
import { RecordStream } from "../record-stream";
import type { FormatTag, ParserOptions } from "../types";
import { HeaderMetadata } from "./headers";
import { classifyLine, splitLines } from "./lines";

/**
 * Build states a data line passes through on its way to the record stream
 */
export type BuildStage =
  | "init"
  | "fields-split"
  | "coordinates-validated"
  | "optional-fields-attached"
  | "blocks-validated"
  | "emitted";

/**
 * Outcome of building one record. Warnings accompany both outcomes; a
 * rejection names the last stage the line reached.
 */
export type BuildResult<T> =
  | { readonly status: "emitted"; readonly record: T; readonly warnings: readonly FieldDefect[] }
  | {
      readonly status: "rejected";
      readonly stage: BuildStage;
      readonly defect: FieldDefect;
      readonly warnings: readonly FieldDefect[];
    };

export type LoadStatus = "loaded" | "no-valid-records";

export interface ParseOutcome<T> {
  readonly records: RecordStream<T>;
  readonly headers: HeaderMetadata;
  readonly diagnostics: readonly Diagnostic[];
  readonly status: LoadStatus;
}

/**
 * Per-call load target; `into` lets the host watch records arrive
 */
export interface LoadTarget<T> {
  into?: RecordStream<T>;
}

type ResolvedBaseOptions = Required<
  Pick<ParserOptions, "skipValidation" | "maxLineLength" | "trackLineNumbers" | "onError" | "onWarning">
>;

const ParserOptionsSchema = type({
  "skipValidation?": "boolean",
  "maxLineLength?": "number.integer>0",
  "trackLineNumbers?": "boolean",
});

interface LoadSession<T> {
  readonly records: RecordStream<T>;
  readonly headers: HeaderMetadata;
  readonly log: DiagnosticLog;
}

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions & ResolvedBaseOptions;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    validateParserOptions(options);

    const baseDefaults: ResolvedBaseOptions = {
      skipValidation: false,
      maxLineLength: 1_000_000,
      trackLineNumbers: true,
      onError: (error: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Error (line ${lineNumber}): ${error}`);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    // Explicit undefined in user options falls back to the default
    this.options = {
      ...options,
      skipValidation: options.skipValidation ?? baseDefaults.skipValidation,
      maxLineLength: options.maxLineLength ?? baseDefaults.maxLineLength,
      trackLineNumbers: options.trackLineNumbers ?? baseDefaults.trackLineNumbers,
      onError: options.onError ?? baseDefaults.onError,
      onWarning: options.onWarning ?? baseDefaults.onWarning,
    };
    this.interruptHandler = new InterruptHandler(this.options.signal, (message, lineNumber) =>
      this.createError(message, lineNumber)
    );
  }

  /**
   * Format tag used for line classification
   */
  protected abstract readonly format: FormatTag;

  /**
   * Format name for diagnostics (e.g. "BED", "GFF3")
   */
  protected abstract getFormatName(): string;

  /**
   * Build a record from the fields of one data line
   */
  protected abstract buildRecord(fields: readonly string[], lineNumber?: number): BuildResult<T>;

  /**
   * Format-specific error for conditions that abort a whole load
   */
  protected abstract createError(message: string, lineNumber?: number): ParseError;

  // ============================================================================
  // INTERRUPT HANDLING
  // ============================================================================

  protected checkAborted(): void {
    this.interruptHandler.checkAborted();
  }

  protected throwIfAborted(lineNumber: number): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} loading`, lineNumber);
  }

  // ============================================================================
  // LOADING
  // ============================================================================

  /**
   * Parse a complete document held in memory
   *
   * @throws {ParseError} If the signal aborts the load
   */
  parseString(data: string, target: LoadTarget<T> = {}): ParseOutcome<T> {
    const session = this.openSession(target);
    try {
      this.checkAborted();
      const lines = splitLines(data);
      for (let i = 0; i < lines.length; i++) {
        this.consumeLine(lines[i] ?? "", i + 1, session);
      }
    } finally {
      session.records.seal();
    }
    return this.closeSession(session);
  }

  /**
   * Parse a byte stream line by line
   *
   * @throws {ParseError} If the signal aborts the load
   * @throws {StreamError} If the stream fails
   */
  async parse(stream: ReadableStream<Uint8Array>, target: LoadTarget<T> = {}): Promise<ParseOutcome<T>> {
    const session = this.openSession(target);
    try {
      this.checkAborted();
      let lineNumber = 0;
      for await (const line of readLines(stream)) {
        lineNumber++;
        this.consumeLine(line, lineNumber, session);
      }
    } finally {
      session.records.seal();
    }
    return this.closeSession(session);
  }

  /**
   * Parse a file, streaming it through the platform FileSystem
   *
   * @throws {FileError} If the file cannot be opened
   */
  async parseFile(
    filePath: string,
    target: LoadTarget<T> = {},
    fileOptions: FileReaderOptions = {}
  ): Promise<ParseOutcome<T>> {
    const stream = await createStream(filePath, fileOptions);
    return this.parse(stream, target);
  }

  private openSession(target: LoadTarget<T>): LoadSession<T> {
    const records = target.into ?? new RecordStream<T>();
    if (records.sealed) {
      throw new ValidationError("Cannot load into a sealed record stream");
    }
    return {
      records,
      headers: new HeaderMetadata(),
      log: new DiagnosticLog({ onError: this.options.onError, onWarning: this.options.onWarning }),
    };
  }

  private closeSession(session: LoadSession<T>): ParseOutcome<T> {
    return {
      records: session.records,
      headers: session.headers,
      diagnostics: session.log.diagnostics,
      status: session.records.length > 0 ? "loaded" : "no-valid-records",
    };
  }

  /**
   * Route one raw line: headers are kept, blanks skipped, data lines built.
   * A record reaches the stream only after it is completely built.
   */
  private consumeLine(line: string, lineNumber: number, session: LoadSession<T>): void {
    this.throwIfAborted(lineNumber);
    const { log } = session;

    if (line.length > this.options.maxLineLength) {
      log.report(
        {
          kind: "LineTooLong",
          message: `line length ${line.length} exceeds ${this.options.maxLineLength}`,
        },
        "error",
        lineNumber,
        line
      );
      return;
    }

    const classified = classifyLine(line, this.format);
    switch (classified.kind) {
      case "comment":
      case "browser":
      case "track":
        session.headers.add(classified.kind, classified.raw, lineNumber);
        return;
      case "blank":
        return;
      case "invalid":
        log.report(classified.defect, "error", lineNumber, line);
        return;
      case "data": {
        const result = this.buildRecord(
          classified.fields,
          this.options.trackLineNumbers ? lineNumber : undefined
        );
        for (const warning of result.warnings) {
          log.report(warning, "warning", lineNumber, line);
        }
        if (result.status === "emitted") {
          session.records.append(result.record);
        } else {
          log.report(result.defect, "error", lineNumber, line);
        }
        return;
      }
    }
  }
}

function validateParserOptions(options: ParserOptions): void {
  const provided = Object.fromEntries(
    Object.entries({
      skipValidation: options.skipValidation,
      maxLineLength: options.maxLineLength,
      trackLineNumbers: options.trackLineNumbers,
    }).filter(([, value]) => value !== undefined)
  );
  const result = ParserOptionsSchema(provided);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid parser options: ${result.summary}`);
  }
}

/**
 * AbortSignal integration for parsers
 */
class InterruptHandler {
  constructor(
    private readonly signal: AbortSignal | undefined,
    private readonly createError: (message: string, lineNumber?: number) => ParseError
  ) {}

  /**
   * @throws {ParseError} If the operation was aborted
   */
  checkAborted(): void {
    if (this.signal?.aborted) {
      throw this.createError("Operation was aborted");
    }
  }

  /**
   * @throws {ParseError} If the operation was aborted
   */
  throwIfAborted(context: string, lineNumber: number): void {
    if (this.signal?.aborted) {
      throw this.createError(`Operation aborted during ${context}`, lineNumber);
    }
  }
}
