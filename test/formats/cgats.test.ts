/**
 * Tests for the CGATS table parser
 */

import { describe, expect, test } from "vitest";
import { FormatError } from "../../src/errors";
import { getKeyword, parseCgats, tokenizeCgatsLine } from "../../src/formats/cgats";

const SAMPLE = [
  "CTI2   ",
  "",
  'DESCRIPTOR "Argyll Calibration Target chart information 2"',
  "# generated for tests",
  'KEYWORD "APPROX_WHITE_POINT"',
  'APPROX_WHITE_POINT "95.1 100.0 108.8"',
  "STEPS_IN_PASS 8",
  "",
  "NUMBER_OF_FIELDS 5",
  "BEGIN_DATA_FORMAT",
  "SAMPLE_ID SAMPLE_LOC",
  "RGB_R RGB_G RGB_B",
  "END_DATA_FORMAT",
  "",
  "NUMBER_OF_SETS 2",
  "BEGIN_DATA",
  '1 "A1" 100.00 100.00 100.00',
  '2 "A2" 0.00 0.00 0.00',
  "END_DATA",
  "",
  "CTI2",
  "NUMBER_OF_FIELDS 1",
  "BEGIN_DATA_FORMAT",
  "SAMPLE_ID",
  "END_DATA_FORMAT",
  "NUMBER_OF_SETS 1",
  "BEGIN_DATA",
  "1",
  "END_DATA",
].join("\n");

describe("tokenizeCgatsLine", () => {
  test("splits on whitespace and keeps quoted tokens whole", () => {
    const { tokens, comment } = tokenizeCgatsLine('KEY "a b"\t12 # note');
    expect(tokens).toEqual([
      { text: "KEY", quoted: false },
      { text: "a b", quoted: true },
      { text: "12", quoted: false },
    ]);
    expect(comment).toBe("note");
  });

  test("a # inside quotes is not a comment", () => {
    const { tokens, comment } = tokenizeCgatsLine('NOTE "#1 patch"');
    expect(tokens.map((token) => token.text)).toEqual(["NOTE", "#1 patch"]);
    expect(comment).toBeUndefined();
  });
});

describe("parseCgats", () => {
  test("reads header, data format and data of the first table", () => {
    const table = parseCgats(SAMPLE, "TI2");

    expect(table.fileType).toBe("CTI2");
    expect(table.declaredKeywords).toEqual(["APPROX_WHITE_POINT"]);
    expect(table.keywords.map((keyword) => keyword.key)).toEqual([
      "DESCRIPTOR",
      "APPROX_WHITE_POINT",
      "STEPS_IN_PASS",
    ]);
    expect(getKeyword(table, "APPROX_WHITE_POINT")).toBe("95.1 100.0 108.8");
    expect(getKeyword(table, "STEPS_IN_PASS")).toBe("8");
    expect(table.fields).toEqual(["SAMPLE_ID", "SAMPLE_LOC", "RGB_R", "RGB_G", "RGB_B"]);
    expect(table.declaredFields).toBe(5);
    expect(table.declaredSets).toBe(2);
    expect(table.rows).toEqual([
      { values: ["1", "A1", "100.00", "100.00", "100.00"], lineNumber: 17 },
      { values: ["2", "A2", "0.00", "0.00", "0.00"], lineNumber: 18 },
    ]);
  });

  test("records whether a keyword value was quoted", () => {
    const table = parseCgats(SAMPLE);
    const steps = table.keywords.find((keyword) => keyword.key === "STEPS_IN_PASS");
    const descriptor = table.keywords.find((keyword) => keyword.key === "DESCRIPTOR");
    expect(steps?.quoted).toBe(false);
    expect(descriptor?.quoted).toBe(true);
  });

  test("accepts the data format on a single line", () => {
    const table = parseCgats(
      "CTI3\nBEGIN_DATA_FORMAT SAMPLE_ID LAB_L END_DATA_FORMAT\nBEGIN_DATA\n1 50.0\nEND_DATA\n"
    );
    expect(table.fields).toEqual(["SAMPLE_ID", "LAB_L"]);
    expect(table.rows).toHaveLength(1);
  });

  test("rejects BEGIN_DATA before any data format", () => {
    expect(() => parseCgats("CTI2\nBEGIN_DATA\n1\nEND_DATA\n", "TI2")).toThrow(
      "BEGIN_DATA without a preceding data format block"
    );
  });

  test("rejects an unterminated data block", () => {
    expect(() =>
      parseCgats("CTI2\nBEGIN_DATA_FORMAT\nSAMPLE_ID\nEND_DATA_FORMAT\nBEGIN_DATA\n1\n")
    ).toThrow("Data block is not terminated by END_DATA");
  });

  test("reports a malformed count with its line", () => {
    try {
      parseCgats("CTI2\n\nNUMBER_OF_SETS many\n", "TI2");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FormatError);
      if (error instanceof FormatError) {
        expect(error.message).toBe("NUMBER_OF_SETS must be a non-negative integer, got 'many'");
        expect(error.lineNumber).toBe(3);
        expect(error.format).toBe("TI2");
      }
    }
  });

  test("rejects empty input", () => {
    expect(() => parseCgats("\n\n")).toThrow("Empty CGATS file");
  });
});
