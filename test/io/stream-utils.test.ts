import { describe, expect, test } from "vitest";
import { StreamError } from "../../src/errors";
import { processBuffer, readLines, textToStream } from "../../src/io/stream-utils";
import { collect } from "../helpers";

describe("processBuffer", () => {
  test("returns complete lines and the unterminated remainder", () => {
    expect(processBuffer("a\r\nb\nc")).toEqual({ lines: ["a", "b"], remainder: "c" });
    expect(processBuffer("no newline")).toEqual({ lines: [], remainder: "no newline" });
  });
});

describe("readLines", () => {
  test("reassembles lines split across chunks", async () => {
    const text = "chr1\t0\t10\r\nchr2\t5\t50\n\nlast";
    for (const chunkSize of [1, 2, 5, 1024]) {
      expect(await collect(readLines(textToStream(text, chunkSize)))).toEqual([
        "chr1\t0\t10",
        "chr2\t5\t50",
        "",
        "last",
      ]);
    }
  });

  test("a final newline adds no empty line", async () => {
    expect(await collect(readLines(textToStream("a\nb\n")))).toEqual(["a", "b"]);
  });

  test("decodes multi-byte characters split across chunks", async () => {
    expect(await collect(readLines(textToStream("gène\tñ\n", 2)))).toEqual(["gène\tñ"]);
  });

  test("a failing stream becomes a StreamError", async () => {
    const failing = new ReadableStream<Uint8Array>({
      pull(controller): void {
        controller.error(new Error("disk went away"));
      },
    });
    await expect(collect(readLines(failing))).rejects.toBeInstanceOf(StreamError);
  });
});
