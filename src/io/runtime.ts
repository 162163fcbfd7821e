/**
 * Effect platform layer and program runner for file I/O
 *
 * Every file operation is an Effect program that needs the platform
 * FileSystem service. This module provides the Node.js layer and runs
 * programs, mapping platform failures to FileError.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";
import { FileError } from "../errors";

/**
 * Effect platform layer providing FileSystem, Path and friends
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a file program against the platform layer
 *
 * @throws {FileError} Carrying the platform error when the program fails
 */
export async function runFileProgram<A, E>(
  program: Effect.Effect<A, E, NodeContext.NodeContext>,
  operation: FileError["operation"],
  filePath: string
): Promise<A> {
  const exit = await Effect.runPromiseExit(program.pipe(Effect.provide(getPlatform())));
  if (Exit.isFailure(exit)) {
    const failure = Cause.squash(exit.cause);
    if (failure instanceof FileError) throw failure;
    throw FileError.fromSystemError(operation, filePath, failure);
  }
  return exit.value;
}
