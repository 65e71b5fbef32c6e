/**
 * DSV Format Type Definitions
 *
 * Types for the delimiter-separated reference corpus reader and the
 * mapping-table writer.
 */

import type { ParserOptions } from "../../types";

// =============================================================================
// TYPES
// =============================================================================

/**
 * One data row keyed by header column name.
 * Columns the row is too short to fill are absent.
 */
export interface DSVRecord {
  readonly lineNumber: number;
  readonly values: Readonly<Record<string, string | undefined>>;
  /** Fields beyond the header width */
  readonly extra: readonly string[];
}

/**
 * States of the field-splitting state machine
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * Result of splitting one physical or accumulated row
 */
export interface RowSplitResult {
  readonly fields: string[];
  /** False when the row ends inside a quoted field */
  readonly complete: boolean;
}

/**
 * DSV parser options extending base parser options
 */
export interface DSVParserOptions extends ParserOptions {
  delimiter?: string;
  quote?: string;
  /** Maximum physical lines one quoted field may span (default: 100) */
  maxFieldLines?: number;
  /** Decompressor selection for parseFile (default: by magic bytes) */
  compression?: "auto" | "gzip" | "none";
}

/**
 * DSV writer options for output formatting
 */
export interface DSVWriterOptions {
  delimiter?: string;
  quote?: string;
  lineEnding?: "\n" | "\r\n";
  /** Rows buffered before each write to the file handle (default: 1024) */
  flushEvery?: number;
}

export type DSVField = string | number | null | undefined;
