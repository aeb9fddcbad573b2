/**
 * Error handling for measurement conversion and profiling
 *
 * Every failure the pipeline can raise is one of the classes below, so callers
 * can tell a malformed input file from a count mismatch, an I/O failure or a
 * failed profiling run.
 */

/**
 * Base error class for all spectro-ti3 errors
 */
export class Ti3Error extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "Ti3Error";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for invalid options or configuration values
 */
export class ValidationError extends Ti3Error {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Malformed or internally inconsistent input file
 *
 * Raised at parse time: a partial photometric field group, a non-numeric
 * SAMPLE_ID, a broken CGATS header and the like.
 */
export class FormatError extends Ti3Error {
  constructor(
    message: string,
    public readonly format: "CSV" | "TI2" | "CGATS" | "TI3",
    public readonly filePath?: string,
    lineNumber?: number,
    context?: string
  ) {
    super(filePath ? `${message} in ${filePath}` : message, "FORMAT_ERROR", lineNumber, context);
    this.name = "FormatError";
  }

  /**
   * Re-raise a string-level parse error with the file it came from
   */
  withFile(filePath: string): FormatError {
    if (this.filePath !== undefined) return this;
    return new FormatError(this.message, this.format, filePath, this.lineNumber, this.context);
  }
}

/**
 * Measurement row count differs from chart patch count
 */
export class CountMismatchError extends Ti3Error {
  constructor(
    public readonly measurementCount: number,
    public readonly patchCount: number
  ) {
    super(
      `Measurement count ${measurementCount} does not match chart patch count ${patchCount}`,
      "COUNT_MISMATCH",
      undefined,
      `CSV rows: ${measurementCount}, chart patches: ${patchCount}`
    );
    this.name = "CountMismatchError";
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nSuggestion: Export exactly one measurement per chart patch, in chart order`;
    return msg;
  }
}

/**
 * File I/O errors with system error context
 *
 * Covers unreadable inputs and unwritable outputs.
 */
export class FileError extends Ti3Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "rename" | "remove" | "mkdir",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  /**
   * Get helpful suggestion based on system error
   */
  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or choose a writable location";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * A configured input file does not exist
 */
export class MissingInputError extends FileError {
  constructor(
    filePath: string,
    public readonly role: "csv" | "chart"
  ) {
    super(
      `${role === "csv" ? "Measurement CSV" : "Chart"} not found: ${filePath}`,
      filePath,
      "stat",
      undefined,
      `Check inputs.${role} in the configuration, or place the file in the input folder`
    );
    this.name = "MissingInputError";
  }
}

/**
 * The external profiling tool could not be run or exited unsuccessfully
 */
export class ExternalToolError extends Ti3Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string = "",
    context?: string
  ) {
    super(message, "EXTERNAL_TOOL_ERROR", undefined, context);
    this.name = "ExternalToolError";
  }

  /**
   * Create error for an executable that is not on PATH
   */
  static forMissingCommand(command: string): ExternalToolError {
    return new ExternalToolError(
      `Command not found: ${command}`,
      command,
      127,
      "",
      command === "colprof"
        ? "Install ArgyllCMS and make sure 'colprof' is on your PATH, or set profiler.run to false to skip profile generation"
        : undefined
    );
  }

  /**
   * Create error for a run that finished with a non-zero exit code
   */
  static forExitCode(command: string, exitCode: number, stderr: string): ExternalToolError {
    const lastLine = stderr.trim().split(/\r?\n/).pop();
    return new ExternalToolError(
      `${command} failed with exit code ${exitCode}${lastLine ? `: ${lastLine}` : ""}`,
      command,
      exitCode,
      stderr
    );
  }

  override toString(): string {
    let msg = super.toString();
    const output = this.stderr.trimEnd();
    if (output !== "") {
      msg += `\n${this.command} output:\n${output}`;
    }
    return msg;
  }
}

/**
 * Pipeline stage identifiers, in execution order
 */
export type PipelineStage = "config" | "read-csv" | "read-chart" | "pair" | "write-ti3" | "profile";

/**
 * A stage of the conversion pipeline failed
 *
 * Wraps the underlying error so the message names both the stage and the
 * cause; the original error stays available as `cause`.
 */
export class PipelineError extends Ti3Error {
  constructor(
    public readonly stage: PipelineStage,
    public override readonly cause: Ti3Error
  ) {
    super(`[${stage}] ${cause.message}`, cause.code, cause.lineNumber, cause.context);
    this.name = "PipelineError";
  }
}

/**
 * Normalize an error thrown inside a stage into a Ti3Error
 *
 * Operating system errors (a Node errno `code`, or an Effect platform
 * `SystemError`) become FileErrors on `fallbackPath`.
 *
 * @returns undefined for anything else, which callers rethrow unchanged
 */
export function toTi3Error(error: unknown, fallbackPath: string): Ti3Error | undefined {
  if (error instanceof Ti3Error) return error;
  if (isSystemError(error)) return FileError.fromSystemError("read", fallbackPath, error);
  return undefined;
}

function isSystemError(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;
  if ("code" in error && typeof error.code === "string") return true;
  return "_tag" in error && error._tag === "SystemError";
}

/**
 * Process exit code for a failure
 *
 * 2 for configuration problems and missing inputs, the tool's own exit code
 * for a failed profiler run, 1 for everything else.
 */
export function exitCodeFor(error: unknown): number {
  const cause = error instanceof PipelineError ? error.cause : error;
  if (error instanceof PipelineError && error.stage === "config") return 2;
  if (cause instanceof MissingInputError || cause instanceof ValidationError) return 2;
  if (cause instanceof ExternalToolError) return cause.exitCode === 0 ? 1 : cause.exitCode;
  return 1;
}
