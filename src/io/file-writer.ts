/**
 * Writing files through the Effect platform FileSystem
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { runFileProgram } from "./runtime";

export interface WriteOptions {
  /** Make missing parent directories first (default: true) */
  createDirectories?: boolean;
}

const ensureParent = (file: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;
    const parent = path.dirname(file);
    if (!(yield* fs.exists(parent))) {
      yield* fs.makeDirectory(parent, { recursive: true });
    }
  });

/**
 * Replace the file's content with `content`
 *
 * @throws {FileError} If the destination cannot be written
 *
 * @example
 * ```typescript
 * await writeString("out/peaks.bed", "chr1\t10\t20\n");
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  { createDirectories = true }: WriteOptions = {}
): Promise<void> {
  await runFileProgram(
    Effect.gen(function* () {
      if (createDirectories) yield* ensureParent(path);
      const fs = yield* FileSystem.FileSystem;
      yield* fs.writeFileString(path, content);
    }),
    "write",
    path
  );
}

/**
 * @throws {FileError} If the file cannot be removed
 */
export async function deleteFile(path: string): Promise<void> {
  await runFileProgram(
    Effect.flatMap(FileSystem.FileSystem, (fs) => fs.remove(path)),
    "write",
    path
  );
}
