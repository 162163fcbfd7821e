/**
 * Stream processing utilities for line-oriented text
 */

import { StreamError } from "../errors";

/**
 * Split complete lines off a text buffer
 *
 * Lines end at LF; a CR before the LF is dropped. Text after the last LF
 * is returned as the remainder, so a CRLF split across two chunks is still
 * recognised once the next chunk arrives.
 */
export function processBuffer(buffer: string): { lines: string[]; remainder: string } {
  const lines = buffer.split("\n");
  const remainder = lines.pop() ?? "";
  return {
    lines: lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line)),
    remainder,
  };
}

/**
 * Convert ReadableStream<Uint8Array> to an async iterable of lines
 *
 * Blank lines are yielded so line numbers stay aligned with the source.
 * A final newline does not produce a trailing empty line.
 *
 * @throws {StreamError} If the underlying stream fails
 * @example
 * ```typescript
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith("track")) console.log(line);
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;

  try {
    while (true) {
      const chunk = await reader.read().catch((error: unknown) => {
        throw new StreamError(
          `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
          "read",
          totalBytesProcessed
        );
      });

      if (chunk.done) break;

      buffer += decoder.decode(chunk.value, { stream: true });
      totalBytesProcessed += chunk.value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;
      yield* result.lines;
    }

    buffer += decoder.decode();
    const tail = processBuffer(buffer);
    yield* tail.lines;
    if (tail.remainder !== "") {
      yield tail.remainder.endsWith("\r") ? tail.remainder.slice(0, -1) : tail.remainder;
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Wrap text in a byte stream, split into chunks of the given size
 */
export function textToStream(text: string, chunkSize = 65_536): ReadableStream<Uint8Array> {
  const bytes = new TextEncoder().encode(text);
  let offset = 0;

  return new ReadableStream<Uint8Array>({
    pull(controller): void {
      if (offset >= bytes.length) {
        controller.close();
        return;
      }
      controller.enqueue(bytes.subarray(offset, offset + chunkSize));
      offset += chunkSize;
    },
  });
}
