/**
 * Abstract base parser with shared interrupt handling
 *
 * Gives the measurement and chart readers the same option merging, AbortSignal
 * support and warning reporting without imposing how each format is parsed.
 */

import { FormatError, Ti3Error } from "../errors";
import type { ParserOptions } from "../types";

/**
 * Format identifiers used in parser error messages
 */
export type ParserFormat = FormatError["format"];

/**
 * Options after defaults have been applied
 */
export type ResolvedOptions<TOptions extends ParserOptions> = Required<ParserOptions> &
  FormatDefaults<TOptions> &
  TOptions;

/**
 * Format-specific options with every default filled in
 */
export type FormatDefaults<TOptions extends ParserOptions> = Required<
  Omit<TOptions, keyof ParserOptions>
>;

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser yields (MeasurementRow, ChartPatch)
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: ResolvedOptions<TOptions>;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    // Merge in order: base -> format-specific -> user options
    const baseDefaults: Required<ParserOptions> = {
      signal: new AbortController().signal,
      onWarning: (warning: string, lineNumber?: number): void => {
        const location = lineNumber !== undefined ? ` (line ${lineNumber})` : "";
        console.warn(`${this.getFormatName()} Warning${location}: ${warning}`);
      },
    };

    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Get format-specific default options
   */
  protected abstract getDefaultOptions(): FormatDefaults<TOptions>;

  // ============================================================================
  // SHARED INTERRUPT HANDLING
  // ============================================================================

  /**
   * Check if parsing should stop; call this in parsing loops
   */
  protected checkAborted(): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} parsing`);
  }

  /**
   * Report a recoverable problem through the configured warning handler
   */
  protected warn(message: string, lineNumber?: number): void {
    this.options.onWarning(message, lineNumber);
  }

  /**
   * Build a FormatError tagged with this parser's format
   */
  protected formatError(message: string, lineNumber?: number, context?: string): FormatError {
    return new FormatError(message, this.getFormatName(), undefined, lineNumber, context);
  }

  // ============================================================================
  // ABSTRACT METHODS
  // ============================================================================

  /**
   * Parse records from an in-memory string
   * @param data - Raw file content
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file
   * @param filePath - Path to the input file
   */
  abstract parseFile(filePath: string): AsyncIterable<T>;

  /**
   * Get format name for error messages and warnings
   */
  protected abstract getFormatName(): ParserFormat;
}

/**
 * Interrupt handler utility for AbortSignal integration
 */
class InterruptHandler {
  constructor(private readonly signal: AbortSignal) {}

  /**
   * @throws {Ti3Error} If the operation was aborted
   */
  throwIfAborted(context: string): void {
    if (this.signal.aborted) {
      throw new Ti3Error(`Operation aborted during ${context}`, "ABORTED");
    }
  }
}

