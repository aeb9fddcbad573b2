/**
 * Tests for the chart (TI2) reader
 */

import { rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FormatError } from "../../src/errors";
import { ChartParser, inferColorRep, readChart, readChartString } from "../../src/formats/ti2";
import { collect } from "../utils/collect";
import { chartText, makeTempDir } from "../utils/fixtures";

describe("readChartString", () => {
  test("reads patches in file order with raw device values", () => {
    const chart = readChartString(chartText({ patches: 4 }));

    expect(chart.patches.map((patch) => patch.sampleId)).toEqual([1, 2, 3, 4]);
    expect(chart.patches[0]?.deviceValues).toEqual(["1.00", "50.00", "0.00"]);
    expect(chart.patches[3]?.deviceValues).toEqual(["4.00", "50.00", "0.00"]);
    expect(chart.patches[0]?.sampleLoc).toBeUndefined();
    expect(chart.header.colorRep).toBe("iRGB");
    expect(chart.header.colorRepDeclared).toBe(true);
    expect(chart.header.deviceFields).toEqual(["RGB_R", "RGB_G", "RGB_B"]);
    expect(chart.header.layout).toEqual({});
    expect(chart.header.declaredSets).toBe(4);
  });

  test("shares one header object across patches", () => {
    const chart = readChartString(chartText({ patches: 2 }));
    expect(chart.patches[0]?.header).toBe(chart.header);
    expect(chart.patches[1]?.header).toBe(chart.header);
  });

  test("copies SAMPLE_LOC values without quotes", () => {
    const chart = readChartString(chartText({ patches: 2, sampleLocs: ["A1", "A2"] }));
    expect(chart.patches.map((patch) => patch.sampleLoc)).toEqual(["A1", "A2"]);
  });

  test("reads layout keywords", () => {
    const chart = readChartString(
      chartText({
        patches: 2,
        layout: { stepsInPass: 8, passesInStrips2: 2, indexOrder: "PATCH_THEN_STRIP" },
      })
    );
    expect(chart.header.layout).toEqual({
      stepsInPass: 8,
      passesInStrips2: 2,
      indexOrder: "PATCH_THEN_STRIP",
    });
  });

  test("infers the device space when COLOR_REP is absent", () => {
    const chart = readChartString(chartText({ patches: 1, colorRep: null }));
    expect(chart.header.colorRep).toBe("iRGB");
    expect(chart.header.colorRepDeclared).toBe(false);
  });

  test("rejects SAMPLE_IDs out of sequence", () => {
    const text = chartText({ patches: 3 }).replace("\n2 2.00", "\n5 2.00");
    expect(() => readChartString(text)).toThrow("SAMPLE_ID 5 out of sequence; expected 2");
  });

  test("rejects non-numeric SAMPLE_IDs", () => {
    const text = chartText({ patches: 2 }).replace("\n1 1.00", "\nfirst 1.00");
    expect(() => readChartString(text)).toThrow("Non-numeric SAMPLE_ID 'first'");
  });

  test("rejects a chart without SAMPLE_ID", () => {
    const text = chartText({ patches: 1 })
      .replace("SAMPLE_ID RGB_R", "ID RGB_R");
    expect(() => readChartString(text)).toThrow("Chart data format has no SAMPLE_ID field");
  });

  test("rejects rows with the wrong number of values", () => {
    const text = chartText({ patches: 2 }).replace("\n2 2.00 50.00 0.00", "\n2 2.00 50.00");
    expect(() => readChartString(text)).toThrow("Row has 3 values but the data format lists 4 fields");
  });

  test("rejects non-numeric device values", () => {
    const text = chartText({ patches: 1 }).replace("\n1 1.00", "\n1 red");
    expect(() => readChartString(text)).toThrow("Non-numeric RGB_R value 'red'");
  });

  test("rejects a NUMBER_OF_SETS that disagrees with the data", () => {
    const text = chartText({ patches: 3 }).replace("NUMBER_OF_SETS 3", "NUMBER_OF_SETS 4");
    expect(() => readChartString(text)).toThrow(
      "NUMBER_OF_SETS is 4 but the data block has 3 rows"
    );
  });

  test("rejects an unknown INDEX_ORDER", () => {
    const text = chartText({ patches: 1, layout: { indexOrder: "DIAGONAL" } });
    expect(() => readChartString(text)).toThrow(
      "INDEX_ORDER must be STRIP_THEN_PATCH or PATCH_THEN_STRIP, got 'DIAGONAL'"
    );
  });

  test("rejects a zero STEPS_IN_PASS", () => {
    const text = chartText({ patches: 1, layout: { stepsInPass: 0 } });
    expect(() => readChartString(text)).toThrow("STEPS_IN_PASS must be a positive integer, got '0'");
  });

  test("rejects a chart with no device space at all", () => {
    const text = [
      "CTI2",
      "NUMBER_OF_FIELDS 2",
      "BEGIN_DATA_FORMAT",
      "SAMPLE_ID XYZ_X",
      "END_DATA_FORMAT",
      "NUMBER_OF_SETS 1",
      "BEGIN_DATA",
      "1 95.0",
      "END_DATA",
    ].join("\n");
    expect(() => readChartString(text)).toThrow(FormatError);
  });
});

describe("inferColorRep", () => {
  test("maps device field families", () => {
    expect(inferColorRep(["CMYK_C", "CMYK_M", "CMYK_Y", "CMYK_K"])).toBe("iCMYK");
    expect(inferColorRep(["GRAY_W"])).toBe("iW");
    expect(inferColorRep(["6CLR_1"])).toBe("i6CLR");
    expect(inferColorRep([])).toBeUndefined();
  });
});

describe("ChartParser", () => {
  test("streams patches from text", async () => {
    const patches = await collect(new ChartParser().parseString(chartText({ patches: 3 })));
    expect(patches.map((patch) => patch.sampleId)).toEqual([1, 2, 3]);
  });

  describe("files", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = makeTempDir();
    });

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true });
    });

    test("readChart reads from disk", async () => {
      const path = join(tempDir, "chart.ti2");
      writeFileSync(path, chartText({ patches: 2 }));
      const chart = await readChart(path);
      expect(chart.patches).toHaveLength(2);
    });

    test("format errors name the file", async () => {
      const path = join(tempDir, "bad.ti2");
      writeFileSync(path, chartText({ patches: 2 }).replace("NUMBER_OF_SETS 2", "NUMBER_OF_SETS 9"));
      await expect(collect(new ChartParser().parseFile(path))).rejects.toThrow(
        `NUMBER_OF_SETS is 9 but the data block has 2 rows in ${path}`
      );
    });
  });
});
