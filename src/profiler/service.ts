/**
 * Effect-based profile generation service
 *
 * The conversion pipeline depends on ProfilerService rather than on a child
 * process directly, so tests can swap in a layer that records invocations
 * without ArgyllCMS installed.
 *
 * @example Running colprof through the service
 * ```typescript
 * import { Effect } from "effect";
 * import { ProfilerService } from "./profiler";
 *
 * const program = Effect.gen(function* () {
 *   const profiler = yield* ProfilerService;
 *   return yield* profiler.run(invocation);
 * });
 *
 * await Effect.runPromise(program.pipe(Effect.provide(ProfilerService.Live)));
 * ```
 *
 * @module profiler/service
 */

import { delimiter, join } from "node:path";
import { Command, FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { NodeContext } from "@effect/platform-node";
import { Context, Effect, Layer, Option, Stream } from "effect";
import { ExternalToolError } from "../errors";
import type { ProfilerInvocation, ProfilerResult } from "./types";

// =============================================================================
// SERVICE SHAPE (Interface)
// =============================================================================

/**
 * Shape of the profiler service
 */
export interface ProfilerServiceShape {
  /**
   * Run an external profiling command to completion
   *
   * @param invocation - Command, arguments and extra environment
   * @returns Effect producing the captured output; fails when the command
   * cannot be started or exits non-zero
   */
  readonly run: (invocation: ProfilerInvocation) => Effect.Effect<ProfilerResult, ExternalToolError>;

  /**
   * Whether a command can be found on PATH
   */
  readonly isAvailable: (command: string) => Effect.Effect<boolean>;
}

// =============================================================================
// SERVICE TAG
// =============================================================================

/**
 * Profiler service for Effect-based dependency injection
 */
export class ProfilerService extends Context.Tag("spectro-ti3/ProfilerService")<
  ProfilerService,
  ProfilerServiceShape
>() {
  /**
   * Spawns the command as a child process on Node.js
   */
  static readonly Live: Layer.Layer<ProfilerService> = Layer.succeed(ProfilerService, {
    run: (invocation) => runCommand(invocation),
    isAvailable: (command) => findOnPath(command),
  });
}

// =============================================================================
// SERVICE IMPLEMENTATION
// =============================================================================

function runCommand(invocation: ProfilerInvocation): Effect.Effect<ProfilerResult, ExternalToolError> {
  const command = Command.make(invocation.command, ...invocation.args).pipe(
    Command.env(invocation.env)
  );

  const program = Effect.gen(function* () {
    const child = yield* Command.start(command);
    const [stdout, stderr, exitCode] = yield* Effect.all(
      [collectText(child.stdout), collectText(child.stderr), child.exitCode],
      { concurrency: "unbounded" }
    );
    return { exitCode: Number(exitCode), stdout, stderr };
  });

  return program.pipe(
    Effect.scoped,
    Effect.provide(NodeContext.layer),
    Effect.mapError((error) => toExternalToolError(invocation.command, error)),
    Effect.flatMap((result) =>
      result.exitCode === 0
        ? Effect.succeed(result)
        : Effect.fail(ExternalToolError.forExitCode(invocation.command, result.exitCode, result.stderr))
    )
  );
}

// Explicit paths are checked as given; bare names are searched on PATH
function findOnPath(command: string): Effect.Effect<boolean> {
  const candidates = command.includes("/")
    ? [command]
    : (process.env["PATH"] ?? "")
        .split(delimiter)
        .filter((directory) => directory !== "")
        .map((directory) => join(directory, command));

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    for (const candidate of candidates) {
      const info = yield* fs.stat(candidate).pipe(Effect.option);
      if (Option.isSome(info) && info.value.type === "File") return true;
    }
    return false;
  });

  return program.pipe(Effect.provide(NodeContext.layer));
}

function collectText<E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> {
  return stream.pipe(
    Stream.decodeText(),
    Stream.runFold("", (text, chunk) => text + chunk)
  );
}

function toExternalToolError(command: string, error: PlatformError): ExternalToolError {
  const missing =
    (error._tag === "SystemError" && error.reason === "NotFound") || error.message.includes("ENOENT");
  if (missing) {
    return ExternalToolError.forMissingCommand(command);
  }
  return new ExternalToolError(`Failed to run ${command}: ${error.message}`, command, 1);
}
