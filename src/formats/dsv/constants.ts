/**
 * DSV Format Constants
 */

export const DEFAULT_DELIMITERS = {
  csv: ",",
  tsv: "\t",
} as const;

/**
 * Default quote character (RFC 4180 compliant)
 */
export const DEFAULT_QUOTE = '"';

/**
 * Maximum field size for memory safety (100MB)
 */
export const MAX_FIELD_SIZE = 100_000_000;

export const DEFAULT_MAX_FIELD_LINES = 100;

export const DEFAULT_FLUSH_EVERY = 1024;
