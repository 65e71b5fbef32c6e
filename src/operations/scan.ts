/**
 * Reference corpus scan
 *
 * One streaming pass over the reference table, collecting every accepted
 * coordinate for the wanted identifiers.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { TSVParser } from "../formats/dsv";
import type { CandidateMap, ScanResult, VariationId } from "../types";
import { filterReferenceRow } from "./filter";

export interface ScanOptions {
  /** Required genome assembly; empty accepts every assembly */
  readonly assembly: string;
  readonly signal?: AbortSignal;
}

const ScanOptionsSchema = type({
  assembly: "string",
  "signal?": "unknown",
});

/**
 * Scan a reference table (gzip or plain) for coordinates of wanted identifiers
 *
 * Every data row counts as scanned. Every accepted row counts as kept, even
 * when it repeats a coordinate already seen for the same identifier.
 *
 * @throws {ValidationError} If the options are invalid
 * @throws {FileError} If the file cannot be read
 * @throws {CompressionError} If the gzip stream is corrupt or truncated
 * @throws {DSVParseError} If a quoted field never closes
 */
export async function scanReference(
  path: string,
  wanted: ReadonlySet<VariationId>,
  options: ScanOptions
): Promise<ScanResult> {
  const validation = ScanOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid scan options: ${validation.summary}`);
  }

  const parser = new TSVParser(options.signal === undefined ? {} : { signal: options.signal });
  const candidates = new Map<VariationId, CandidateMap>();
  let rowsScanned = 0;
  let rowsKept = 0;

  for await (const record of parser.parseFile(path)) {
    rowsScanned++;

    const verdict = filterReferenceRow(record.values, wanted, options.assembly);
    if (verdict.outcome !== "accept") continue;
    rowsKept++;

    let perId = candidates.get(verdict.variationId);
    if (perId === undefined) {
      perId = new Map();
      candidates.set(verdict.variationId, perId);
    }
    if (!perId.has(verdict.key)) {
      perId.set(verdict.key, verdict.coordinates);
    }
  }

  return { candidates, stats: { rowsScanned, rowsKept } };
}
