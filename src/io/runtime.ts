/**
 * Effect platform layer selection
 *
 * The package runs on Node.js; the Node platform layer provides the
 * FileSystem, Path and CommandExecutor services every I/O helper needs.
 */

import type { CommandExecutor, FileSystem, Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";

/**
 * Services the platform layer provides
 */
export type PlatformServices = FileSystem.FileSystem | Path.Path | CommandExecutor.CommandExecutor;

/**
 * Get the Effect platform layer for the current process
 *
 * @returns Layer providing FileSystem, Path and CommandExecutor
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run an Effect program against the Node platform layer
 *
 * Failures are rethrown as the program's own error value rather than the
 * runtime's fiber wrapper, so callers can `instanceof` them.
 */
export async function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, PlatformServices>
): Promise<A> {
  const exit = await Effect.runPromiseExit(program.pipe(Effect.provide(getPlatform())));
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
