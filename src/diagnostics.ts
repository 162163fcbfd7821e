/**
 * Per-line defect reporting
 *
 * A load never aborts on a bad line. Each problem becomes a Diagnostic
 * attributed to its line number and a truncated copy of the line, and the
 * caller decides what to do with the list.
 *
 * @module diagnostics
 */

export type DefectKind =
  | "TooFewFields"
  | "EmptySequenceName"
  | "NonNumericCoordinate"
  | "CoordinateOutOfRange"
  | "InvalidCoordinateOrder"
  | "InvalidBlockStructure"
  | "UnrecognizedEnum"
  | "MalformedAttribute"
  | "ConversionMissingRequiredAttribute"
  | "NotNumeric"
  | "LineTooLong"
  | "SchemaViolation";

/**
 * A defect found while coercing or assembling a single field or record
 */
export interface FieldDefect {
  readonly kind: DefectKind;
  readonly message: string;
  readonly field?: string;
}

/**
 * `error` means the line was skipped; `warning` means the record was kept
 * in degraded form.
 */
export type Severity = "error" | "warning";

export interface Diagnostic extends FieldDefect {
  readonly severity: Severity;
  readonly lineNumber?: number;
  readonly content?: string;
}

export const MAX_CONTENT_LENGTH = 60;

/**
 * Shorten a line for display in a diagnostic
 */
export function truncateContent(line: string, maxLength = MAX_CONTENT_LENGTH): string {
  return line.length > maxLength ? `${line.slice(0, maxLength)}…` : line;
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = diagnostic.lineNumber !== undefined ? `line ${diagnostic.lineNumber}: ` : "";
  const content = diagnostic.content !== undefined ? ` [${diagnostic.content}]` : "";
  return `${where}${diagnostic.kind}: ${diagnostic.message}${content}`;
}

/**
 * Collects diagnostics for one load and forwards them to the parser hooks
 */
export class DiagnosticLog {
  private readonly entries: Diagnostic[] = [];

  constructor(
    private readonly hooks: {
      onError?: (error: string, lineNumber?: number) => void;
      onWarning?: (warning: string, lineNumber?: number) => void;
    } = {}
  ) {}

  report(
    defect: FieldDefect,
    severity: Severity,
    lineNumber?: number,
    line?: string
  ): Diagnostic {
    const diagnostic: Diagnostic = {
      ...defect,
      severity,
      ...(lineNumber !== undefined ? { lineNumber } : {}),
      ...(line !== undefined ? { content: truncateContent(line) } : {}),
    };
    this.entries.push(diagnostic);

    const message = `${defect.kind}: ${defect.message}`;
    if (severity === "error") {
      this.hooks.onError?.(message, lineNumber);
    } else {
      this.hooks.onWarning?.(message, lineNumber);
    }
    return diagnostic;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.entries;
  }
}
