/**
 * Core type definitions for variant ID mapping
 *
 * Shapes for the two input corpora, the candidate coordinates built while
 * scanning, and the partitioned output tables.
 */

import { type } from "arktype";

// =============================================================================
// VARIANT DOMAIN TYPES
// =============================================================================

/**
 * Identifier shared by a sample-corpus record and a reference row
 * (ClinVar VariationID). Always a non-negative safe integer.
 */
export type VariationId = number;

/**
 * Canonical coordinates of a single-nucleotide variant
 */
export interface CoordinateTuple {
  readonly chromosome: string;
  /** VCF position, decimal digits only */
  readonly position: string;
  /** Upper-cased single base */
  readonly referenceAllele: string;
  /** Upper-cased single base */
  readonly alternateAllele: string;
}

/**
 * `{chrom}_{pos}_{ref}_{alt}` rendering of a CoordinateTuple
 */
export type CoordinateKey = string;

/**
 * Distinct candidate coordinates for one identifier
 */
export type CandidateMap = Map<CoordinateKey, CoordinateTuple>;

/**
 * Reference corpus row viewed through its header.
 * Columns missing from the header or from a short row are absent.
 */
export type ReferenceRow = Readonly<Record<string, string | undefined>>;

/**
 * Counters produced by one pass over the reference corpus
 */
export interface ScanStats {
  /** Every data row read, wanted or not */
  readonly rowsScanned: number;
  /** Rows that passed every filter, duplicates included */
  readonly rowsKept: number;
}

/**
 * Result of scanning the reference corpus
 */
export interface ScanResult {
  readonly candidates: ReadonlyMap<VariationId, CandidateMap>;
  readonly stats: ScanStats;
}

/**
 * Identifier resolved to exactly one coordinate
 */
export interface UniqueMapping extends CoordinateTuple {
  readonly variationId: VariationId;
  readonly key: CoordinateKey;
}

/**
 * One of the N ≥ 2 coordinates an identifier resolved to
 */
export interface AmbiguousMapping extends UniqueMapping {
  readonly candidateCount: number;
}

/**
 * Disjoint output of the partition engine, in emission order
 */
export interface MappingPartition {
  readonly unique: readonly UniqueMapping[];
  readonly ambiguous: readonly AmbiguousMapping[];
}

/**
 * Counts reported at the end of a mapping run
 */
export interface MappingSummary extends ScanStats {
  readonly identifiersCollected: number;
  readonly uniqueWritten: number;
  readonly ambiguousWritten: number;
}

// =============================================================================
// PARSER AND I/O TYPES
// =============================================================================

/**
 * Parser configuration options shared by the corpus readers
 */
export interface ParserOptions {
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Compression formats the readers understand
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Compression detection result with confidence scoring
 */
export interface CompressionDetection {
  readonly format: CompressionFormat;
  /** Detection confidence level (0-1) */
  readonly confidence: number;
  readonly magicBytes?: Uint8Array;
  readonly detectionMethod: "magic-bytes";
}

/**
 * Decompressor configuration options
 */
export interface DecompressorOptions {
  /** AbortController signal for cancelling decompression */
  readonly signal?: AbortSignal;
}

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64KiB) */
  readonly bufferSize?: number;
  /** Decompression to apply; "auto" sniffs the magic bytes (default: "auto") */
  readonly compression?: CompressionFormat | "auto";
  /** Options passed to the decompressor */
  readonly decompression?: DecompressorOptions;
}

/**
 * Line processing result for text streams
 */
export interface LineProcessingResult {
  /** Complete lines extracted from buffer */
  readonly lines: string[];
  /** Incomplete text carried to the next chunk */
  readonly remainder: string;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * Non-empty file path without null bytes
 */
export const FilePathSchema = type("string>0").narrow(
  (path, ctx) => !path.includes("\0") || ctx.mustBe("a path without null characters")
);

/**
 * Decompressor options schema
 */
export const DecompressorOptionsSchema = type({
  "signal?": type.instanceOf(AbortSignal),
});

/**
 * File reader options schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "number.integer>0",
  "compression?": "'auto' | 'gzip' | 'none'",
  "decompression?": DecompressorOptionsSchema,
});
