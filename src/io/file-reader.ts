/**
 * File reading utilities built on Effect Platform
 *
 * All Effect plumbing stays inside this module; callers get Promise-based
 * functions that throw `FileError`.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { FileError } from "../errors";
import type { FilePath, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { runWithPlatform } from "./runtime";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  maxFileSize: 67_108_864, // 64MB; measurement exports are a few hundred KB
};

/**
 * Check if a path exists and is a regular file
 *
 * @param path File path to check
 * @returns Promise resolving to true if the path is a readable file
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", validatedPath, error)));

  return runWithPlatform(program);
}

/**
 * Read entire file to string
 *
 * Text is decoded as UTF-8 (a leading BOM is dropped). Instrument software on
 * Windows often exports in the ANSI code page instead, so bytes that are not
 * valid UTF-8 are decoded as Windows-1252.
 *
 * @param path File path to read
 * @param options Reading options
 * @returns Promise resolving to file content as string
 * @throws {FileError} If file cannot be read or is too large
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    if (Number(info.size) > mergedOptions.maxFileSize) {
      return yield* Effect.fail(
        new FileError(
          `File too large: ${Number(info.size)} bytes exceeds limit of ${mergedOptions.maxFileSize} bytes`,
          validatedPath,
          "read"
        )
      );
    }
    return yield* fs.readFile(validatedPath);
  }).pipe(
    Effect.mapError((error) =>
      error instanceof FileError ? error : FileError.fromSystemError("read", validatedPath, error)
    )
  );

  return decodeText(await runWithPlatform(program));
}

/**
 * Decode file bytes, falling back to Windows-1252 for non-UTF-8 input
 */
export function decodeText(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (_decodeError) {
    return new TextDecoder("windows-1252").decode(bytes);
  }
}

/**
 * Validate file path using ArkType and return branded type
 *
 * @throws {FileError} If the path is empty or contains NUL characters
 */
export function validatePath(path: string): FilePath {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return { ...DEFAULT_OPTIONS, ...options };
}
