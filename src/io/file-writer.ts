/**
 * Atomic file writing on Effect Platform
 *
 * Content goes to a temporary sibling of the destination which is then renamed
 * over it, so a reader never observes a half-written file and a failed write
 * leaves the destination untouched.
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { validatePath } from "./file-reader";
import { runWithPlatform } from "./runtime";

/**
 * Write a string to a file atomically
 *
 * Parent directories are created as needed. The temporary file is removed if
 * either the write or the rename fails.
 *
 * @param path Destination file path
 * @param content Text to write (UTF-8)
 * @throws {FileError} If the directory cannot be created or the write fails
 */
export async function writeStringAtomic(path: string, content: string): Promise<void> {
  const target = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;

    const directory = pathService.dirname(target);
    yield* fs
      .makeDirectory(directory, { recursive: true })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", directory, error)));

    const tempPath = temporarySibling(target);
    yield* fs.writeFileString(tempPath, content).pipe(
      Effect.mapError((error) => FileError.fromSystemError("write", target, error)),
      Effect.zipRight(
        fs
          .rename(tempPath, target)
          .pipe(Effect.mapError((error) => FileError.fromSystemError("rename", target, error)))
      ),
      Effect.tapError(() => removeIfPresent(fs, tempPath))
    );
  });

  await runWithPlatform(program);
}

/**
 * Temporary file name next to the destination
 */
export function temporarySibling(target: string): string {
  const suffix = Math.random().toString(36).slice(2, 10);
  return `${target}.${process.pid}.${suffix}.tmp`;
}

// Cleanup after a failed write; the original failure is what gets reported.
function removeIfPresent(fs: FileSystem.FileSystem, path: string): Effect.Effect<void> {
  return fs.exists(path).pipe(
    Effect.flatMap((present) => (present ? fs.remove(path) : Effect.void)),
    Effect.ignore
  );
}
