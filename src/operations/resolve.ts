/**
 * Candidate resolution and output tables
 *
 * Splits identifiers by how many distinct coordinates they resolved to and
 * writes the two tab-separated tables.
 */

import { TSVWriter } from "../formats/dsv";
import type { DSVField } from "../formats/dsv";
import type {
  AmbiguousMapping,
  CandidateMap,
  MappingPartition,
  UniqueMapping,
  VariationId,
} from "../types";

export const UNIQUE_HEADER = [
  "pickle_ID",
  "Chromosome",
  "PositionVCF",
  "ReferenceAlleleVCF",
  "AlternateAlleleVCF",
  "chr_pos_ref_alt",
] as const;

export const AMBIGUOUS_HEADER = [...UNIQUE_HEADER, "n_candidates"] as const;

export interface TablePaths {
  readonly uniquePath: string;
  readonly ambiguousPath: string;
}

export interface TableCounts {
  readonly uniqueWritten: number;
  readonly ambiguousWritten: number;
}

/**
 * Partition identifiers into unique and ambiguous mappings
 *
 * Identifiers are emitted in ascending order. An ambiguous identifier
 * contributes one row per candidate, ordered by coordinate key. Identifiers
 * without candidates contribute nothing.
 */
export function partitionCandidates(
  candidates: ReadonlyMap<VariationId, CandidateMap>
): MappingPartition {
  const unique: UniqueMapping[] = [];
  const ambiguous: AmbiguousMapping[] = [];

  const ids = [...candidates.keys()].sort((a, b) => a - b);
  for (const variationId of ids) {
    const perId = candidates.get(variationId);
    if (perId === undefined || perId.size === 0) continue;

    const keys = [...perId.keys()].sort(compareCodePoints);
    if (keys.length === 1) {
      const key = keys[0];
      const coordinates = key === undefined ? undefined : perId.get(key);
      if (key !== undefined && coordinates !== undefined) {
        unique.push({ variationId, key, ...coordinates });
      }
      continue;
    }

    for (const key of keys) {
      const coordinates = perId.get(key);
      if (coordinates === undefined) continue;
      ambiguous.push({ variationId, key, ...coordinates, candidateCount: keys.length });
    }
  }

  return { unique, ambiguous };
}

/**
 * Write both tables, creating parent directories; headers are always written
 *
 * @throws {FileError} If either file cannot be written
 */
export async function writeMappingTables(
  partition: MappingPartition,
  paths: TablePaths
): Promise<TableCounts> {
  const writer = new TSVWriter();

  const uniqueWritten = await writer.writeFile(
    paths.uniquePath,
    UNIQUE_HEADER,
    partition.unique.map(uniqueRow)
  );
  const ambiguousWritten = await writer.writeFile(
    paths.ambiguousPath,
    AMBIGUOUS_HEADER,
    partition.ambiguous.map((mapping) => [...uniqueRow(mapping), mapping.candidateCount])
  );

  return { uniqueWritten, ambiguousWritten };
}

function uniqueRow(mapping: UniqueMapping): DSVField[] {
  return [
    mapping.variationId,
    mapping.chromosome,
    mapping.position,
    mapping.referenceAllele,
    mapping.alternateAllele,
    mapping.key,
  ];
}

// UTF-16 ordering differs from code point ordering only for astral characters
function compareCodePoints(a: string, b: string): number {
  const left = [...a];
  const right = [...b];
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const x = left[i]?.codePointAt(0) ?? 0;
    const y = right[i]?.codePointAt(0) ?? 0;
    if (x !== y) return x - y;
  }
  return left.length - right.length;
}
