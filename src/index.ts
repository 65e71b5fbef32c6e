/**
 * variant-id-mapper
 *
 * Maps sample-corpus variant identifiers to chromosome/position/ref/alt
 * coordinates with one streaming pass over a ClinVar-style variant summary.
 */

export {
  CompressionDetector,
  decompressStream,
  GzipDecompressor,
  openDecompressed,
} from "./compression";
export {
  CompressionError,
  DSVParseError,
  FileError,
  ParseError,
  RecordStreamError,
  ValidationError,
  VariantMapError,
} from "./errors";
export {
  classifyRecord,
  DSVParser,
  DSVWriter,
  encodeRecord,
  isKeyValueMap,
  RecordParser,
  TSVParser,
  TSVWriter,
  writeRecords,
} from "./formats";
export type {
  DSVField,
  DSVParserOptions,
  DSVRecord,
  DSVWriterOptions,
  MalformedRecord,
  RecordParserOptions,
  SampleRecord,
  StructuredRecord,
} from "./formats";
export { createStream, exists } from "./io/file-reader";
export { openForWriting } from "./io/file-writer";
export type { FileWriteHandle } from "./io/file-writer";
export { readLines } from "./io/stream-utils";
export * from "./operations";
export type {
  AmbiguousMapping,
  CandidateMap,
  CoordinateKey,
  CoordinateTuple,
  MappingPartition,
  MappingSummary,
  ReferenceRow,
  ScanResult,
  ScanStats,
  UniqueMapping,
  VariationId,
} from "./types";
