/**
 * Tests for error classes and exit codes
 */

import { describe, expect, test } from "vitest";
import {
  CountMismatchError,
  ExternalToolError,
  exitCodeFor,
  FileError,
  FormatError,
  MissingInputError,
  PipelineError,
  toTi3Error,
  ValidationError,
} from "../src/errors";

describe("exitCodeFor", () => {
  test("maps configuration and input problems to 2", () => {
    expect(exitCodeFor(new PipelineError("config", new FileError("gone", "/c.json", "read")))).toBe(2);
    expect(exitCodeFor(new PipelineError("read-csv", new MissingInputError("/m.csv", "csv")))).toBe(2);
    expect(exitCodeFor(new ValidationError("bad option"))).toBe(2);
  });

  test("passes the profiler's exit code through", () => {
    const failure = ExternalToolError.forExitCode("colprof", 5, "");
    expect(exitCodeFor(new PipelineError("profile", failure))).toBe(5);
    expect(exitCodeFor(new ExternalToolError("odd", "colprof", 0))).toBe(1);
  });

  test("maps everything else to 1", () => {
    expect(exitCodeFor(new PipelineError("pair", new CountMismatchError(3, 4)))).toBe(1);
    expect(exitCodeFor(new FormatError("broken", "TI2"))).toBe(1);
    expect(exitCodeFor(new Error("unexpected"))).toBe(1);
  });
});

describe("error messages", () => {
  test("FormatError names the file once", () => {
    const error = new FormatError("Non-numeric SAMPLE_ID 'x'", "TI2", undefined, 12);
    const located = error.withFile("/c.ti2");

    expect(located.message).toBe("Non-numeric SAMPLE_ID 'x' in /c.ti2");
    expect(located.withFile("/other.ti2")).toBe(located);
    expect(located.toString()).toBe("FormatError: Non-numeric SAMPLE_ID 'x' in /c.ti2 (line 12)");
  });

  test("MissingInputError describes the role", () => {
    expect(new MissingInputError("/in/c.ti2", "chart").message).toBe("Chart not found: /in/c.ti2");
  });

  test("PipelineError prefixes the stage and keeps the cause", () => {
    const cause = new CountMismatchError(5, 4);
    const error = new PipelineError("pair", cause);

    expect(error.message).toBe("[pair] Measurement count 5 does not match chart patch count 4");
    expect(error.cause).toBe(cause);
    expect(error.code).toBe("COUNT_MISMATCH");
  });

  test("toTi3Error wraps operating system errors as file errors", () => {
    const systemError = Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
    const wrapped = toTi3Error(systemError, "/out/p.ti3");

    expect(wrapped).toBeInstanceOf(FileError);
    expect(wrapped?.message).toBe(
      "read failed for /out/p.ti3: EACCES: permission denied. Check file permissions or choose a writable location"
    );
  });

  test("toTi3Error leaves programming errors alone", () => {
    expect(toTi3Error(new TypeError("rows.map is not a function"), "/in/m.csv")).toBeUndefined();
    expect(toTi3Error("plain string", "/in/m.csv")).toBeUndefined();
  });

  test("ExternalToolError prints the tool's full error output", () => {
    const error = ExternalToolError.forExitCode(
      "colprof",
      1,
      "colprof: Warning - odd patch\ncolprof: Error - fit failed\n"
    );

    expect(error.toString()).toBe(
      [
        "ExternalToolError: colprof failed with exit code 1: colprof: Error - fit failed",
        "colprof output:",
        "colprof: Warning - odd patch",
        "colprof: Error - fit failed",
      ].join("\n")
    );
  });
});
