/**
 * TI3 measurement file writer
 *
 * Serializes a Ti3Document into the CGATS text colprof reads, and writes it
 * to disk atomically.
 *
 * @module ti3/writer
 */

import { type } from "arktype";
import { FormatError, ValidationError } from "../../errors";
import { writeStringAtomic } from "../../io/file-writer";
import { formatDataBlock, formatDataFormat, formatKeyword } from "../cgats/writer";
import type { PairedSample, Ti3Document, Ti3WriterOptions } from "./types";

const DEFAULT_DESCRIPTOR = "Converted spectrophotometer measurements";
const DEFAULT_ORIGINATOR = "spectro-ti3";

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const;
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"] as const;

/**
 * TI3 writer options validation schema
 */
export const Ti3WriterOptionsSchema = type({
  "descriptor?": "string",
  "originator?": "string",
  "created?": "Date",
});

/**
 * Format a timestamp the way CGATS CREATED lines carry it
 *
 * @example
 * ```typescript
 * formatCgatsDate(new Date(2026, 9, 19, 9, 15, 0)); // "Mon Oct 19 09:15:00 2026"
 * ```
 */
export function formatCgatsDate(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  return [
    WEEKDAYS[date.getDay()],
    MONTHS[date.getMonth()],
    pad(date.getDate()),
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`,
    date.getFullYear(),
  ].join(" ");
}

/**
 * TI3 writer
 *
 * @example
 * ```typescript
 * const writer = new Ti3Writer({ descriptor: "Glossy paper, CR30" });
 * await writer.writeFile("output/profile.ti3", document);
 * ```
 */
export class Ti3Writer {
  private readonly options: Ti3WriterOptions;

  constructor(options: Ti3WriterOptions = {}) {
    const validation = Ti3WriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid TI3 writer options: ${validation.summary}`);
    }
    this.options = options;
  }

  /**
   * Serialize a document to TI3 text
   *
   * @throws {FormatError} If a sample does not fill the declared columns
   */
  formatDocument(document: Ti3Document): string {
    const rows = document.samples.map((sample) => this.formatSample(sample, document));

    const lines = [
      "CTI3",
      "",
      ...this.formatHeader(document),
      "",
      ...formatDataFormat(document.fields),
      "",
      ...formatDataBlock(rows),
    ];

    return `${lines.join("\n")}\n`;
  }

  /**
   * Write a document atomically
   *
   * @throws {FileError} If the destination cannot be written
   */
  async writeFile(path: string, document: Ti3Document): Promise<void> {
    await writeStringAtomic(path, this.formatDocument(document));
  }

  /**
   * Format one sample as data tokens in column order
   */
  formatSample(sample: PairedSample, document: Ti3Document): string[] {
    const tokens = [String(sample.sampleId)];

    if (document.includeSampleLoc) {
      tokens.push(`"${sample.sampleLoc ?? ""}"`);
    }
    tokens.push(...sample.deviceValues);

    if (document.pcsColumns === "XYZ" && sample.xyz !== undefined) {
      tokens.push(...[sample.xyz.X, sample.xyz.Y, sample.xyz.Z].map((v) => v.toFixed(4)));
    } else if (document.pcsColumns === "LAB" && sample.lab !== undefined) {
      tokens.push(...[sample.lab.L, sample.lab.a, sample.lab.b].map((v) => v.toFixed(4)));
    }

    if (document.spectral !== undefined && sample.spectral !== undefined) {
      tokens.push(...sample.spectral.map((v) => v.toFixed(6)));
    }

    if (tokens.length !== document.fields.length) {
      throw new FormatError(
        `Sample ${sample.sampleId} has ${tokens.length} values for ${document.fields.length} fields`,
        "TI3"
      );
    }
    return tokens;
  }

  private formatHeader(document: Ti3Document): string[] {
    const header = [
      formatKeyword("DESCRIPTOR", this.options.descriptor ?? DEFAULT_DESCRIPTOR),
      formatKeyword("ORIGINATOR", this.options.originator ?? DEFAULT_ORIGINATOR),
      formatKeyword("CREATED", formatCgatsDate(this.options.created ?? new Date())),
      formatKeyword("DEVICE_CLASS", document.deviceClass),
      formatKeyword("COLOR_REP", document.colorRep),
    ];

    if (document.spectral !== undefined) {
      header.push(
        formatKeyword("INSTRUMENT_TYPE_SPECTRAL", "YES"),
        formatKeyword("SPECTRAL_BANDS", String(document.spectral.wavelengths.length)),
        formatKeyword("SPECTRAL_START_NM", document.spectral.startNm.toFixed(6)),
        formatKeyword("SPECTRAL_END_NM", document.spectral.endNm.toFixed(6))
      );
    } else {
      header.push(formatKeyword("INSTRUMENT_TYPE_SPECTRAL", "NO"));
    }

    for (const keyword of document.keywords) {
      header.push(formatKeyword(keyword.key, keyword.value, keyword.quoted));
    }

    const { illuminant, observer, instrument } = document.measurementInfo;
    if (illuminant !== undefined) header.push(`# ${formatKeyword("ILLUMINANT_CODE", illuminant)}`);
    if (observer !== undefined) header.push(`# ${formatKeyword("OBSERVER", `${observer} deg`)}`);
    if (instrument !== undefined) header.push(`# ${formatKeyword("INSTRUMENT", instrument)}`);

    return header;
  }
}
