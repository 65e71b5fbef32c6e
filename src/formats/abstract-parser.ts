/**
 * Abstract base parser with shared interrupt handling
 *
 * Gives the reference-corpus and sample-corpus readers the same AbortSignal
 * support and option merging without imposing a parsing strategy.
 */

import { ParseError } from "../errors";
import type { ParserOptions } from "../types";

/**
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions & Required<ParserOptions>;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseDefaults: Required<Omit<ParserOptions, "signal">> = {
      onWarning: (warning: string, lineNumber?: number): void => {
        const where = lineNumber === undefined ? "" : ` (line ${lineNumber})`;
        console.warn(`${this.getFormatName()} Warning${where}: ${warning}`);
      },
    };

    // base -> format-specific -> user options
    this.options = {
      signal: new AbortController().signal,
      ...baseDefaults,
      ...this.getDefaultOptions(),
      ...options,
    };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Throw if the caller aborted; call this in parsing loops
   */
  protected checkAborted(): void {
    this.interruptHandler.checkAborted(this.getFormatName());
  }

  /**
   * Parse records from a binary stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Parse records from a file
   */
  abstract parseFile(filePath: string): AsyncIterable<T>;

  /**
   * Format name for error messages and warnings
   */
  abstract getFormatName(): string;
}

class InterruptHandler {
  constructor(private readonly signal: AbortSignal) {}

  /**
   * @throws {ParseError} If the operation was aborted
   */
  checkAborted(format: string): void {
    if (this.signal.aborted) {
      throw new ParseError(`Operation aborted while reading ${format}`, format);
    }
  }
}
