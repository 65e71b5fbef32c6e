/**
 * Variant ID mapping operations
 *
 * Each stage is usable on its own; `mapVariants` runs them in order.
 */

export {
  collectIdentifiers,
  coerceVariationId,
  identifierOf,
  readRecords,
  DEFAULT_ID_FIELD,
  type CollectOptions,
  type ReadRecordsOptions,
} from "./collect";
export {
  coordinateKey,
  filterReferenceRow,
  isMissing,
  isSnvAllele,
  parseIntegerField,
  REFERENCE_COLUMNS,
  type RejectReason,
  type RowVerdict,
} from "./filter";
export {
  DEFAULT_INSPECT_OPTIONS,
  DEFAULT_MAX_KEYS_PRINT,
  formatInspection,
  formatValue,
  inspectCorpus,
  InspectOptionsSchema,
  keyPrefix,
  pairListKeys,
  shapeOf,
  valueTypeName,
  type CorpusInspection,
  type EmbeddingProfile,
  type FieldProfile,
  type FormatInspectionOptions,
  type InspectOptions,
  type LabelProfile,
  type Tally,
} from "./inspect";
export {
  DEFAULT_MAP_CONFIG,
  mapVariants,
  MapVariantsConfigSchema,
  type MapVariantsConfig,
  type MapVariantsOptions,
} from "./map-variants";
export {
  AMBIGUOUS_HEADER,
  partitionCandidates,
  UNIQUE_HEADER,
  writeMappingTables,
  type TableCounts,
  type TablePaths,
} from "./resolve";
export { scanReference, type ScanOptions } from "./scan";
