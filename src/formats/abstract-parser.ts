/**
 * Abstract base parser with shared option defaults and interrupt handling
 *
 * Provides consistent AbortSignal support to record readers without imposing
 * parsing implementation details.
 */

import { ParseError } from "../errors";
import type { ParserOptions } from "../types";

/**
 * Base options after defaults are applied
 */
export type ResolvedParserOptions = Required<Omit<ParserOptions, "signal">> &
  Pick<ParserOptions, "signal">;

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: ResolvedParserOptions & TOptions;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseDefaults: ResolvedParserOptions = {
      skipValidation: false,
      maxLineLength: 1_000_000,
      trackLineNumbers: true,
      onWarning: (warning: string, lineNumber?: number): void => {
        const where = lineNumber !== undefined ? ` (line ${lineNumber})` : "";
        console.warn(`${this.getFormatName()} Warning${where}: ${warning}`);
      },
    };

    // base -> user options
    this.options = { ...baseDefaults, ...options };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Check if the parse should stop; call this in parsing loops
   */
  protected checkAborted(): void {
    this.interruptHandler.checkAborted();
  }

  /**
   * Check abortion with a description of the current step
   */
  protected throwIfAborted(context: string): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} ${context}`);
  }

  /**
   * Parse records from an in-memory string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file, decompressing `.gz` files
   */
  abstract parseFile(filePath: string): AsyncIterable<T>;

  /**
   * Parse records from a binary stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format identifier for error messages and warnings
   */
  protected abstract getFormatName(): string;
}

/**
 * Interrupt handler utility for AbortSignal integration
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If the operation was aborted
   */
  checkAborted(): void {
    if (this.signal?.aborted === true) {
      throw new ParseError("Operation was aborted", "ABORTED");
    }
  }

  /**
   * @throws {ParseError} If the operation was aborted
   */
  throwIfAborted(context: string): void {
    if (this.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${context}`, "ABORTED");
    }
  }
}
