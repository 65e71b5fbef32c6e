/**
 * @module formats/dsv/writer
 * @description DSV writer for header-led output tables
 *
 * Fields are quoted only when they contain the delimiter, the quote
 * character or a line break. Rows are buffered and flushed to the file
 * handle in batches.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { openForWriting } from "../../io/file-writer";
import { DEFAULT_DELIMITERS, DEFAULT_FLUSH_EVERY, DEFAULT_QUOTE } from "./constants";
import type { DSVField, DSVWriterOptions } from "./types";
import { DSVWriterOptionsSchema } from "./validation";

/**
 * DSVWriter - delimiter-separated table writer
 *
 * @example
 * ```typescript
 * const writer = new TSVWriter();
 * await writer.writeFile('out.tsv', ['id', 'key'], [[1, '1_100_A_G']]);
 * ```
 */
export class DSVWriter {
  private readonly delimiter: string;
  private readonly quote: string;
  private readonly lineEnding: string;
  private readonly flushEvery: number;

  constructor(options: DSVWriterOptions = {}) {
    const validation = DSVWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV writer options: ${validation.summary}`);
    }

    this.delimiter = options.delimiter ?? DEFAULT_DELIMITERS.csv;
    this.quote = options.quote ?? DEFAULT_QUOTE;
    this.lineEnding = options.lineEnding ?? "\n";
    this.flushEvery = options.flushEvery ?? DEFAULT_FLUSH_EVERY;
  }

  private formatField(value: DSVField): string {
    if (value === null || value === undefined) return "";

    const field = String(value);
    const needsQuoting =
      field.includes(this.delimiter) ||
      field.includes(this.quote) ||
      field.includes("\n") ||
      field.includes("\r");

    if (!needsQuoting) {
      return field;
    }
    return this.quote + field.split(this.quote).join(this.quote + this.quote) + this.quote;
  }

  /**
   * Format a row of fields, without line ending
   */
  formatRow(fields: readonly DSVField[]): string {
    return fields.map((field) => this.formatField(field)).join(this.delimiter);
  }

  /**
   * Format a header and rows into one string
   */
  formatRows(header: readonly string[], rows: Iterable<readonly DSVField[]>): string {
    let out = this.formatRow(header) + this.lineEnding;
    for (const row of rows) {
      out += this.formatRow(row) + this.lineEnding;
    }
    return out;
  }

  /**
   * Write a header and rows to a file, creating parent directories
   *
   * The header is written even when there are no rows.
   *
   * @returns Number of data rows written
   * @throws {FileError} When the file cannot be opened or written
   */
  async writeFile(
    path: string,
    header: readonly string[],
    rows: Iterable<readonly DSVField[]>
  ): Promise<number> {
    return openForWriting(path, async (handle) => {
      let pending = this.formatRow(header) + this.lineEnding;
      let pendingRows = 0;
      let written = 0;

      for (const row of rows) {
        pending += this.formatRow(row) + this.lineEnding;
        pendingRows++;
        written++;
        if (pendingRows >= this.flushEvery) {
          await handle.writeString(pending);
          pending = "";
          pendingRows = 0;
        }
      }

      if (pending.length > 0) {
        await handle.writeString(pending);
      }
      return written;
    });
  }
}

/**
 * TSVWriter - tab-delimited convenience writer
 */
export class TSVWriter extends DSVWriter {
  constructor(options: Omit<DSVWriterOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: DEFAULT_DELIMITERS.tsv });
  }
}
