/**
 * Tests for pairing measurements with chart patches
 */

import { describe, expect, test } from "vitest";
import { CountMismatchError, FormatError } from "../../src/errors";
import type { MeasurementRow } from "../../src/formats/measurements";
import { readChartString } from "../../src/formats/ti2";
import { pairMeasurements } from "../../src/operations/pair";
import { selectPcs, spectralFields } from "../../src/operations/pcs";
import { chartText } from "../utils/fixtures";

function labRow(index: number): MeasurementRow {
  return { index, lineNumber: index + 2, lab: { L: 50 + index, a: 1, b: -1 } };
}

function xyzRow(index: number): MeasurementRow {
  return { index, lineNumber: index + 2, xyz: { X: 40, Y: 42 + index, Z: 30 } };
}

function spectralRow(index: number): MeasurementRow {
  return { index, lineNumber: index + 2, spectral: Array.from({ length: 31 }, () => 0.5) };
}

const chart4 = readChartString(chartText({ patches: 4 }));

describe("pairMeasurements", () => {
  test("pairs Lab rows with an RGB chart", () => {
    const rows = [0, 1, 2, 3].map(labRow);
    const document = pairMeasurements(rows, chart4);

    expect(document.colorRep).toBe("iRGB_LAB");
    expect(document.deviceClass).toBe("OUTPUT");
    expect(document.fields).toEqual([
      "SAMPLE_ID",
      "RGB_R",
      "RGB_G",
      "RGB_B",
      "LAB_L",
      "LAB_A",
      "LAB_B",
    ]);
    expect(document.includeSampleLoc).toBe(false);
    expect(document.samples.map((sample) => sample.sampleId)).toEqual([1, 2, 3, 4]);
    expect(document.samples[2]).toEqual({
      sampleId: 3,
      deviceValues: ["3.00", "50.00", "0.00"],
      lab: { L: 52, a: 1, b: -1 },
    });
    expect(document.spectral).toBeUndefined();
  });

  test("rejects a count mismatch before anything else", () => {
    const rows = [0, 1, 2, 3, 4].map(labRow);
    expect(() => pairMeasurements(rows, chart4)).toThrow(CountMismatchError);
    expect(() => pairMeasurements(rows, chart4)).toThrow(
      "Measurement count 5 does not match chart patch count 4"
    );
  });

  test("rejects an empty pairing", () => {
    const empty = { header: chart4.header, patches: [] };
    expect(() => pairMeasurements([], empty)).toThrow("No measurement rows to pair");
  });

  test("emits only XYZ when rows carry both XYZ and Lab", () => {
    const rows = [0, 1, 2, 3].map((index) => ({ ...labRow(index), ...xyzRow(index) }));
    const document = pairMeasurements(rows, chart4);

    expect(document.colorRep).toBe("iRGB_XYZ");
    expect(document.fields.slice(4)).toEqual(["XYZ_X", "XYZ_Y", "XYZ_Z"]);
    expect(document.samples[0]?.lab).toBeUndefined();
    expect(document.samples[0]?.xyz).toEqual({ X: 40, Y: 42, Z: 30 });
  });

  test("declares XYZ with no colorimetric columns for spectral-only rows", () => {
    const rows = [0, 1, 2, 3].map(spectralRow);
    const document = pairMeasurements(rows, chart4);

    expect(document.colorRep).toBe("iRGB_XYZ");
    expect(document.pcs).toBe("XYZ");
    expect(document.pcsColumns).toBeUndefined();
    expect(document.fields).toEqual(["SAMPLE_ID", "RGB_R", "RGB_G", "RGB_B", ...spectralFields()]);
    expect(document.spectral).toEqual({
      wavelengths: expect.any(Array),
      startNm: 400,
      endNm: 700,
    });
  });

  test("rejects a row that lacks the selected group", () => {
    const rows = [labRow(0), labRow(1), xyzRow(2), labRow(3)];
    const attempt = () => pairMeasurements(rows, chart4);

    expect(attempt).toThrow(FormatError);
    expect(attempt).toThrow("Measurement row 1 has no XYZ values but other rows do");
  });

  test("adds SAMPLE_LOC when the chart can supply it", () => {
    const chart = readChartString(
      chartText({
        patches: 2,
        layout: { stepsInPass: 1, passesInStrips2: 2, indexOrder: "STRIP_THEN_PATCH" },
      })
    );
    const document = pairMeasurements([labRow(0), labRow(1)], chart);

    expect(document.includeSampleLoc).toBe(true);
    expect(document.fields.slice(0, 2)).toEqual(["SAMPLE_ID", "SAMPLE_LOC"]);
    expect(document.samples.map((sample) => sample.sampleLoc)).toEqual(["A1", "B1"]);
  });

  test("carries chart keywords into the document", () => {
    const chart = readChartString(
      chartText({
        patches: 1,
        extraKeywords: ['PAPER_SIZE "A4"', "COMP_GREY_STEPS 12", 'TARGET_INSTRUMENT "Unused"'],
      })
    );
    const document = pairMeasurements([labRow(0)], chart, {
      deviceClass: "INPUT",
      illuminant: "D65",
      observer: 10,
    });

    expect(document.deviceClass).toBe("INPUT");
    expect(document.keywords).toEqual([
      { key: "PAPER_SIZE", value: "A4", quoted: true },
      { key: "COMP_GREY_STEPS", value: "12", quoted: false },
    ]);
    expect(document.measurementInfo).toEqual({ illuminant: "D65", observer: 10 });
  });
});

describe("selectPcs", () => {
  test("chooses once across all rows", () => {
    expect(selectPcs([labRow(0), xyzRow(1)])).toEqual({
      suffix: "XYZ",
      columns: "XYZ",
      includeSpectral: false,
    });
    expect(selectPcs([labRow(0), { ...labRow(1), ...spectralRow(1) }])).toEqual({
      suffix: "LAB",
      columns: "LAB",
      includeSpectral: true,
    });
  });
});
