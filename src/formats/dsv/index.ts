/**
 * @module formats/dsv
 * @description DSV (Delimiter-Separated Values) format support
 *
 * Streaming header-keyed parsing with transparent gzip handling, and a
 * buffered table writer.
 *
 * @example
 * ```typescript
 * import { TSVParser } from './formats/dsv';
 *
 * for await (const record of new TSVParser().parseFile('variant_summary.txt.gz')) {
 *   console.log(record.values.Chromosome);
 * }
 * ```
 */

export type { DSVField, DSVParserOptions, DSVRecord, DSVWriterOptions, RowSplitResult } from "./types";
export { CSVParseState } from "./types";

export { DSVParser, TSVParser } from "./parser";
export { DSVWriter, TSVWriter } from "./writer";

export { splitRow } from "./state-machine";
export { removeBOM, zipHeader } from "./utils";
export { DSVParserOptionsSchema, DSVWriterOptionsSchema, validateFieldSize } from "./validation";
export { DEFAULT_DELIMITERS, DEFAULT_QUOTE, MAX_FIELD_SIZE } from "./constants";
