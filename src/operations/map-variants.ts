/**
 * End-to-end variant ID mapping
 *
 * collect identifiers -> scan reference -> partition -> write tables.
 * Each stage finishes before the next starts.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { MappingSummary } from "../types";
import { collectIdentifiers, DEFAULT_ID_FIELD } from "./collect";
import { partitionCandidates, writeMappingTables } from "./resolve";
import { scanReference } from "./scan";

/**
 * Mapping run configuration
 */
export const MapVariantsConfigSchema = type({
  samplesPath: "string>0",
  referencePath: "string>0",
  uniquePath: "string>0",
  ambiguousPath: "string>0",
  assembly: "string",
  maxIds: "number.integer>=0",
  idField: "string>0",
}).narrow((config, ctx) => {
  if (config.uniquePath === config.ambiguousPath) {
    return ctx.reject({
      path: ["ambiguousPath"],
      expected: "a path different from uniquePath",
      actual: config.ambiguousPath,
    });
  }
  return true;
});

export type MapVariantsConfig = typeof MapVariantsConfigSchema.infer;

export const DEFAULT_MAP_CONFIG = {
  assembly: "GRCh38",
  maxIds: 50_000,
  idField: DEFAULT_ID_FIELD,
} as const satisfies Partial<MapVariantsConfig>;

export interface MapVariantsOptions {
  /** Receives one progress line per stage (default: console.log) */
  readonly report?: (line: string) => void;
  readonly signal?: AbortSignal;
}

/**
 * Run the whole mapping pipeline
 *
 * @throws {ValidationError} If the configuration is invalid
 * @throws {FileError} If an input cannot be read or an output written
 * @throws {RecordStreamError} If the sample corpus is truncated
 * @throws {CompressionError} If the reference corpus is corrupt
 *
 * @example
 * ```typescript
 * const summary = await mapVariants({
 *   ...DEFAULT_MAP_CONFIG,
 *   samplesPath: "samples.msgpack",
 *   referencePath: "variant_summary.txt.gz",
 *   uniquePath: "out/unique.tsv",
 *   ambiguousPath: "out/ambiguous.tsv",
 * });
 * ```
 */
export async function mapVariants(
  config: MapVariantsConfig,
  options: MapVariantsOptions = {}
): Promise<MappingSummary> {
  const validation = MapVariantsConfigSchema(config);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid mapping configuration: ${validation.summary}`);
  }

  const report = options.report ?? console.log;
  const signal = options.signal === undefined ? {} : { signal: options.signal };

  const wanted = await collectIdentifiers(config.samplesPath, {
    maxIds: config.maxIds,
    idField: config.idField,
    ...signal,
  });
  report(`Collected ${wanted.size} unique IDs from ${config.samplesPath}`);

  const { candidates, stats } = await scanReference(config.referencePath, wanted, {
    assembly: config.assembly,
    ...signal,
  });
  report(`Reference rows scanned: ${stats.rowsScanned}`);
  report(`Reference rows kept after filters: ${stats.rowsKept}`);

  const partition = partitionCandidates(candidates);
  const { uniqueWritten, ambiguousWritten } = await writeMappingTables(partition, {
    uniquePath: config.uniquePath,
    ambiguousPath: config.ambiguousPath,
  });
  report(`Unique mappings written: ${uniqueWritten} -> ${config.uniquePath}`);
  report(`Ambiguous rows written: ${ambiguousWritten} -> ${config.ambiguousPath}`);

  return {
    identifiersCollected: wanted.size,
    rowsScanned: stats.rowsScanned,
    rowsKept: stats.rowsKept,
    uniqueWritten,
    ambiguousWritten,
  };
}
