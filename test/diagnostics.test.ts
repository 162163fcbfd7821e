import { describe, expect, test, vi } from "vitest";
import { DiagnosticLog, formatDiagnostic, truncateContent } from "../src/diagnostics";

describe("DiagnosticLog", () => {
  test("records diagnostics and forwards them by severity", () => {
    const onError = vi.fn();
    const onWarning = vi.fn();
    const log = new DiagnosticLog({ onError, onWarning });

    log.report({ kind: "TooFewFields", message: "got 2" }, "error", 4, "chr1\t1");
    log.report({ kind: "NotNumeric", message: "bad score", field: "score" }, "warning");

    expect(log.diagnostics).toEqual([
      { kind: "TooFewFields", message: "got 2", severity: "error", lineNumber: 4, content: "chr1\t1" },
      { kind: "NotNumeric", message: "bad score", field: "score", severity: "warning" },
    ]);
    expect(onError).toHaveBeenCalledWith("TooFewFields: got 2", 4);
    expect(onWarning).toHaveBeenCalledWith("NotNumeric: bad score", undefined);
  });

  test("formatDiagnostic", () => {
    expect(
      formatDiagnostic({ kind: "LineTooLong", message: "too long", severity: "error", lineNumber: 7, content: "x" })
    ).toBe("line 7: LineTooLong: too long [x]");
  });

  test("truncateContent", () => {
    expect(truncateContent("abc", 2)).toBe("ab…");
    expect(truncateContent("abc")).toBe("abc");
  });
});
