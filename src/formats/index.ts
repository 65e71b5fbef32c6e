/**
 * Central format module exports
 *
 * Single import point for the reference-table (DSV) and sample-corpus
 * (length-prefixed MessagePack) readers and writers.
 *
 * @example
 * ```typescript
 * import { RecordParser, TSVParser } from '../formats';
 * ```
 */

// DSV/TSV format exports
export {
  type DSVField,
  DSVParser,
  type DSVParserOptions,
  type DSVRecord,
  DSVWriter,
  type DSVWriterOptions,
  removeBOM,
  splitRow,
  TSVParser,
  TSVWriter,
  validateFieldSize,
  zipHeader,
} from "./dsv";
// Sample record stream exports
export {
  classifyRecord,
  DEFAULT_MAX_RECORD_SIZE,
  encodeRecord,
  isKeyValueMap,
  type MalformedRecord,
  RecordParser,
  type RecordParserOptions,
  readFrames,
  type SampleRecord,
  type StructuredRecord,
  writeRecords,
} from "./records";
