/**
 * Tests for atomic file writing
 */

import { mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { temporarySibling, writeStringAtomic } from "../../src/io/file-writer";
import { makeTempDir } from "../utils/fixtures";

describe("writeStringAtomic", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  test("creates missing parent directories", async () => {
    const path = join(tempDir, "output", "nested", "profile.ti3");
    await writeStringAtomic(path, "CTI3\n");
    expect(readFileSync(path, "utf8")).toBe("CTI3\n");
  });

  test("replaces existing content", async () => {
    const path = join(tempDir, "profile.ti3");
    writeFileSync(path, "old content that is longer than the new one");
    await writeStringAtomic(path, "new");
    expect(readFileSync(path, "utf8")).toBe("new");
    expect(readdirSync(tempDir)).toEqual(["profile.ti3"]);
  });

  test("leaves nothing behind when the destination cannot be replaced", async () => {
    const target = join(tempDir, "profile.ti3");
    mkdirSync(target);

    const error = await writeStringAtomic(target, "CTI3\n").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FileError);
    expect(error).toMatchObject({ operation: "rename", filePath: target });
    expect(readdirSync(tempDir)).toEqual(["profile.ti3"]);
  });
});

describe("temporarySibling", () => {
  test("stays in the destination directory", () => {
    const path = temporarySibling("/data/output/profile.ti3");
    expect(path.startsWith("/data/output/profile.ti3.")).toBe(true);
    expect(path.endsWith(".tmp")).toBe(true);
  });
});
