/**
 * @module formats/dsv/parser
 * @description Streaming DSV parser for header-keyed tabular corpora
 *
 * Reads the first row as the header and yields every later row keyed by
 * column name. Quoted fields may span lines. Files are decompressed
 * according to their magic bytes, so `.txt.gz` and plain text both work.
 */

import { type } from "arktype";
import { DSVParseError, FileError, ValidationError, VariantMapError } from "../../errors";
import { createStream } from "../../io/file-reader";
import { readLines } from "../../io/stream-utils";
import { AbstractParser } from "../abstract-parser";
import {
  DEFAULT_DELIMITERS,
  DEFAULT_MAX_FIELD_LINES,
  DEFAULT_QUOTE,
} from "./constants";
import { splitRow } from "./state-machine";
import type { DSVParserOptions, DSVRecord } from "./types";
import { removeBOM, zipHeader } from "./utils";
import { DSVParserOptionsSchema, validateFieldSize } from "./validation";

/**
 * DSVParser - header-keyed delimiter-separated parser
 *
 * @example
 * ```typescript
 * const parser = new TSVParser();
 * for await (const record of parser.parseFile('variant_summary.txt.gz')) {
 *   console.log(record.values.VariationID);
 * }
 * ```
 */
export class DSVParser extends AbstractParser<DSVRecord, DSVParserOptions> {
  private readonly delimiter: string;
  private readonly quote: string;
  private readonly maxFieldLines: number;

  protected getDefaultOptions(): Partial<DSVParserOptions> {
    return {
      delimiter: DEFAULT_DELIMITERS.csv,
      quote: DEFAULT_QUOTE,
      maxFieldLines: DEFAULT_MAX_FIELD_LINES,
      compression: "auto",
    };
  }

  constructor(options: DSVParserOptions = {}) {
    const validation = DSVParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV parser options: ${validation.summary}`);
    }
    super(options);

    this.delimiter = this.options.delimiter ?? DEFAULT_DELIMITERS.csv;
    this.quote = this.options.quote ?? DEFAULT_QUOTE;
    this.maxFieldLines = this.options.maxFieldLines ?? DEFAULT_MAX_FIELD_LINES;
  }

  getFormatName(): string {
    return this.delimiter === DEFAULT_DELIMITERS.tsv ? "TSV" : "DSV";
  }

  /**
   * Parse a DSV file, decompressing it when needed
   *
   * @throws {FileError} If the file cannot be opened or read
   * @throws {CompressionError} If the compressed stream is corrupt or truncated
   * @throws {DSVParseError} If a quoted field never closes
   */
  async *parseFile(path: string): AsyncIterable<DSVRecord> {
    try {
      const stream = await createStream(path, {
        compression: this.options.compression ?? "auto",
        decompression: this.options.signal === undefined ? {} : { signal: this.options.signal },
      });
      yield* this.parse(stream);
    } catch (error) {
      if (error instanceof VariantMapError) {
        throw error;
      }
      throw FileError.fromSystemError("read", path, error);
    }
  }

  /**
   * Parse DSV rows from a text byte stream
   */
  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<DSVRecord> {
    let headers: readonly string[] | null = null;
    let lineNumber = 0;
    let pending: string | null = null;
    let rowStartLine = 0;
    let linesInRow = 0;

    for await (const line of readLines(stream)) {
      lineNumber++;
      this.checkAborted();

      let text: string;
      if (pending === null) {
        if (line.length === 0) continue;
        text = lineNumber === 1 ? removeBOM(line) : line;
        rowStartLine = lineNumber;
        linesInRow = 1;
      } else {
        text = `${pending}\n${line}`;
        linesInRow++;
      }

      const split = splitRow(text, this.delimiter, this.quote);
      if (!split.complete) {
        if (linesInRow >= this.maxFieldLines) {
          throw new DSVParseError(
            `Quoted field exceeds maximum line limit (${this.maxFieldLines})`,
            rowStartLine
          );
        }
        pending = text;
        continue;
      }
      pending = null;

      for (const field of split.fields) {
        validateFieldSize(field, rowStartLine);
      }

      if (headers === null) {
        headers = split.fields;
        continue;
      }

      const { values, extra } = zipHeader(headers, split.fields);
      yield { lineNumber: rowStartLine, values, extra };
    }

    if (pending !== null) {
      throw new DSVParseError(
        "Unclosed quote in field",
        rowStartLine,
        undefined,
        pending.slice(0, 50)
      );
    }
  }
}

/**
 * TSVParser - tab-delimited convenience parser
 */
export class TSVParser extends DSVParser {
  constructor(options: Omit<DSVParserOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: DEFAULT_DELIMITERS.tsv });
  }
}
