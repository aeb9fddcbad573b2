/**
 * Tests for configuration loading
 */

import { rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  DEFAULT_PROFILER_SETTINGS,
  loadConfig,
  parseConfig,
  resolveInputPath,
  resolveOutputPath,
} from "../../src/config";
import { FileError, ValidationError } from "../../src/errors";
import { makeTempDir } from "../utils/fixtures";

const CONFIG_PATH = "/work/profile.config.json";

function configText(value: unknown): string {
  return JSON.stringify(value);
}

const minimal = {
  inputs: { csv: "measurements.csv", chart: "chart.ti2" },
  outputs: { ti3: "paper.ti3" },
};

describe("parseConfig", () => {
  test("applies defaults and resolves bare names into input and output folders", () => {
    const config = parseConfig(configText(minimal), CONFIG_PATH);

    expect(config.baseDir).toBe("/work");
    expect(config.inputs).toEqual({
      csv: "/work/input/measurements.csv",
      chart: "/work/input/chart.ti2",
      delimiter: ";",
    });
    expect(config.outputs).toEqual({
      ti3: "/work/output/paper.ti3",
      icc: "/work/output/paper.icc",
      description: "profile",
    });
    expect(config.options).toEqual({ deviceClass: "OUTPUT" });
    expect(config.profiler).toEqual(DEFAULT_PROFILER_SETTINGS);
  });

  test("keeps explicit values", () => {
    const config = parseConfig(
      configText({
        inputs: { csv: "data/m.csv", chart: "/charts/c.ti2", delimiter: "," },
        outputs: { ti3: "out/p.ti3", icc: "final.icm", description: "Matte rag" },
        options: { deviceClass: "INPUT", instrument: "CR30" },
        profiler: { run: false, quality: "h", threads: 8, fwa: true },
      }),
      CONFIG_PATH
    );

    expect(config.inputs).toEqual({ csv: "/work/data/m.csv", chart: "/charts/c.ti2", delimiter: "," });
    expect(config.outputs).toEqual({
      ti3: "/work/out/p.ti3",
      icc: "/work/output/final.icm",
      description: "Matte rag",
    });
    expect(config.options).toEqual({ deviceClass: "INPUT", instrument: "CR30" });
    expect(config.profiler).toEqual({ ...DEFAULT_PROFILER_SETTINGS, run: false, quality: "h", threads: 8, fwa: true });
  });

  test("treats blank optional strings as unset", () => {
    const config = parseConfig(
      configText({ ...minimal, outputs: { ti3: "p.ti3", icc: " ", description: "" } }),
      CONFIG_PATH
    );
    expect(config.outputs.icc).toBe("/work/output/p.icc");
    expect(config.outputs.description).toBe("profile");
  });

  test("rejects invalid JSON", () => {
    expect(() => parseConfig("{ inputs: ", CONFIG_PATH)).toThrow(ValidationError);
    expect(() => parseConfig("{ inputs: ", CONFIG_PATH)).toThrow(
      `Configuration ${CONFIG_PATH} is not valid JSON`
    );
  });

  test("rejects missing sections and unknown keys", () => {
    expect(() => parseConfig(configText({ inputs: minimal.inputs }), CONFIG_PATH)).toThrow(
      `Invalid configuration ${CONFIG_PATH}`
    );
    expect(() =>
      parseConfig(configText({ ...minimal, profiler: { qualty: "h" } }), CONFIG_PATH)
    ).toThrow(ValidationError);
  });

  test("rejects out-of-range profiler values", () => {
    expect(() => parseConfig(configText({ ...minimal, profiler: { quality: "x" } }), CONFIG_PATH)).toThrow(
      ValidationError
    );
    expect(() => parseConfig(configText({ ...minimal, profiler: { threads: 0 } }), CONFIG_PATH)).toThrow(
      ValidationError
    );
    expect(() => parseConfig(configText({ ...minimal, profiler: { threads: 1.5 } }), CONFIG_PATH)).toThrow(
      ValidationError
    );
  });

  test("rejects a multi-character delimiter", () => {
    expect(() =>
      parseConfig(configText({ ...minimal, inputs: { ...minimal.inputs, delimiter: ";;" } }), CONFIG_PATH)
    ).toThrow(ValidationError);
  });
});

describe("path resolution", () => {
  test("resolves inputs and outputs", () => {
    expect(resolveInputPath("chart.ti2", "/work")).toBe("/work/input/chart.ti2");
    expect(resolveInputPath("charts/chart.ti2", "/work")).toBe("/work/charts/chart.ti2");
    expect(resolveInputPath("./chart.ti2", "/work")).toBe("/work/chart.ti2");
    expect(resolveInputPath("/abs/chart.ti2", "/work")).toBe("/abs/chart.ti2");
    expect(resolveOutputPath("paper.ti3", "/work")).toBe("/work/output/paper.ti3");
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  test("resolves paths against the configuration's directory", async () => {
    const path = join(tempDir, "profile.config.json");
    writeFileSync(path, configText(minimal));

    const config = await loadConfig(path);

    expect(config.configPath).toBe(path);
    expect(config.inputs.csv).toBe(join(tempDir, "input", "measurements.csv"));
  });

  test("fails with a FileError when the file is missing", async () => {
    await expect(loadConfig(join(tempDir, "absent.json"))).rejects.toThrow(FileError);
  });
});
