/**
 * Reading files through the Effect platform FileSystem
 *
 * Each export builds an Effect program and runs it with `runFileProgram`,
 * so callers get plain promises and FileError on failure.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { FileError } from "../errors";
import { runFileProgram } from "./runtime";

export interface FileReaderOptions {
  /** Largest file accepted, in bytes */
  maxFileSize?: number;
  /** Bytes per chunk when streaming */
  bufferSize?: number;
}

type ResolvedReaderOptions = Required<FileReaderOptions>;

const ReaderOptionsSchema = type({
  maxFileSize: "number.integer>0",
  bufferSize: "number.integer>0",
});

const PathSchema = type("string>0").narrow((path, ctx) =>
  path.includes("\0") ? ctx.reject("a path without NUL characters") : true
);

const READER_DEFAULTS: ResolvedReaderOptions = {
  maxFileSize: 10_000_000_000,
  bufferSize: 64 * 1024,
};

function checkedPath(path: string): string {
  const checked = PathSchema(path);
  if (checked instanceof type.errors) {
    throw new FileError(`Invalid file path: ${checked.summary}`, path, "stat");
  }
  return checked;
}

function resolveReaderOptions(options: FileReaderOptions, path: string): ResolvedReaderOptions {
  const resolved = {
    maxFileSize: options.maxFileSize ?? READER_DEFAULTS.maxFileSize,
    bufferSize: options.bufferSize ?? READER_DEFAULTS.bufferSize,
  };
  const checked = ReaderOptionsSchema(resolved);
  if (checked instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${checked.summary}`, path, "read");
  }
  return resolved;
}

/**
 * Fails with FileError when the file is over the limit
 */
const enforceSizeLimit = (path: string, limit: number) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const { size } = yield* fs.stat(path);
    const bytes = Number(size);
    if (bytes > limit) {
      return yield* Effect.fail(
        new FileError(`File too large: ${bytes} bytes exceeds limit of ${limit} bytes`, path, "read")
      );
    }
    return bytes;
  });

/**
 * True only for an existing regular file; directories give false
 *
 * @throws {FileError} If the path is invalid or cannot be inspected
 */
export async function exists(path: string): Promise<boolean> {
  const target = checkedPath(path);
  return runFileProgram(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      if (!(yield* fs.exists(target))) return false;
      const { type: kind } = yield* fs.stat(target);
      return kind === "File";
    }),
    "stat",
    target
  );
}

/**
 * @throws {FileError} If the file cannot be inspected
 */
export async function getSize(path: string): Promise<number> {
  const target = checkedPath(path);
  return runFileProgram(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const { size } = yield* fs.stat(target);
      return Number(size);
    }),
    "stat",
    target
  );
}

/**
 * Whole file as UTF-8 text
 *
 * @throws {FileError} If the file cannot be read or is over `maxFileSize`
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const target = checkedPath(path);
  const { maxFileSize } = resolveReaderOptions(options, target);

  return runFileProgram(
    Effect.gen(function* () {
      yield* enforceSizeLimit(target, maxFileSize);
      const fs = yield* FileSystem.FileSystem;
      return yield* fs.readFileString(target);
    }),
    "read",
    target
  );
}

/**
 * Byte stream over the file for line-by-line parsing
 *
 * @throws {FileError} If the path is not a regular file or is over `maxFileSize`
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const target = checkedPath(path);
  const { maxFileSize, bufferSize } = resolveReaderOptions(options, target);

  if (!(await exists(target))) {
    throw new FileError("File does not exist or is not a regular file", target, "read");
  }

  return runFileProgram(
    Effect.gen(function* () {
      yield* enforceSizeLimit(target, maxFileSize);
      const fs = yield* FileSystem.FileSystem;
      return Stream.toReadableStream(fs.stream(target, { chunkSize: bufferSize }));
    }),
    "read",
    target
  );
}
