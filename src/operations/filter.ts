/**
 * Reference row filter
 *
 * A pure, row-local predicate deciding whether a reference row contributes a
 * candidate coordinate for one of the wanted identifiers. Checks run in a
 * fixed order and stop at the first failure, so the reported reason is
 * always the earliest one.
 */

import type { CoordinateKey, CoordinateTuple, ReferenceRow, VariationId } from "../types";

/**
 * Reference columns read by the filter
 */
export const REFERENCE_COLUMNS = {
  variationId: "VariationID",
  assembly: "Assembly",
  chromosome: "Chromosome",
  position: "PositionVCF",
  referenceAllele: "ReferenceAlleleVCF",
  alternateAllele: "AlternateAlleleVCF",
} as const;

const MISSING_TOKENS: ReadonlySet<string> = new Set(["", "na", "n/a", "nan", "none"]);
const SNV_BASES: ReadonlySet<string> = new Set(["A", "C", "G", "T"]);
const SIGNED_INTEGER = /^[+-]?[0-9]+$/;
const DIGITS = /^[0-9]+$/;

export type RejectReason =
  | "invalid-id"
  | "assembly-mismatch"
  | "missing-field"
  | "invalid-position"
  | "not-snv";

/**
 * Outcome of filtering one row
 *
 * `skip` means the row belongs to an identifier nobody asked for;
 * `reject` means it was wanted, or unreadable, but failed a check.
 */
export type RowVerdict =
  | { readonly outcome: "skip"; readonly variationId: VariationId }
  | { readonly outcome: "reject"; readonly reason: RejectReason }
  | {
      readonly outcome: "accept";
      readonly variationId: VariationId;
      readonly key: CoordinateKey;
      readonly coordinates: CoordinateTuple;
    };

/**
 * True when a field is absent, blank, or a placeholder such as "NA"
 */
export function isMissing(value: string | undefined): boolean {
  return value === undefined || MISSING_TOKENS.has(value.trim().toLowerCase());
}

/**
 * True for a single A, C, G or T in either case
 */
export function isSnvAllele(value: string): boolean {
  return SNV_BASES.has(value.toUpperCase());
}

/**
 * Parse an optionally signed decimal integer, ignoring surrounding whitespace
 *
 * @returns `undefined` for anything else, or when outside the safe integer range
 */
export function parseIntegerField(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!SIGNED_INTEGER.test(trimmed)) return undefined;

  const parsed = Number(trimmed);
  if (!Number.isSafeInteger(parsed)) return undefined;
  return parsed === 0 ? 0 : parsed;
}

/**
 * Render coordinates as `{chromosome}_{position}_{ref}_{alt}`
 */
export function coordinateKey(coordinates: CoordinateTuple): CoordinateKey {
  return [
    coordinates.chromosome,
    coordinates.position,
    coordinates.referenceAllele,
    coordinates.alternateAllele,
  ].join("_");
}

/**
 * Decide whether a reference row yields a candidate coordinate
 *
 * @param assembly - Required assembly; empty disables the check. Rows with
 *   an empty Assembly always pass it.
 *
 * @example
 * ```typescript
 * const verdict = filterReferenceRow(row, new Set([10]), "GRCh38");
 * if (verdict.outcome === "accept") console.log(verdict.key); // "1_100_A_G"
 * ```
 */
export function filterReferenceRow(
  row: ReferenceRow,
  wanted: ReadonlySet<VariationId>,
  assembly: string
): RowVerdict {
  const variationId = parseIntegerField(row[REFERENCE_COLUMNS.variationId]);
  if (variationId === undefined) {
    return { outcome: "reject", reason: "invalid-id" };
  }
  if (!wanted.has(variationId)) {
    return { outcome: "skip", variationId };
  }

  const rowAssembly = (row[REFERENCE_COLUMNS.assembly] ?? "").trim();
  if (assembly !== "" && rowAssembly !== "" && rowAssembly !== assembly) {
    return { outcome: "reject", reason: "assembly-mismatch" };
  }

  const chromosome = row[REFERENCE_COLUMNS.chromosome];
  const position = row[REFERENCE_COLUMNS.position];
  const referenceAllele = row[REFERENCE_COLUMNS.referenceAllele];
  const alternateAllele = row[REFERENCE_COLUMNS.alternateAllele];
  if (
    chromosome === undefined ||
    position === undefined ||
    referenceAllele === undefined ||
    alternateAllele === undefined ||
    isMissing(chromosome) ||
    isMissing(position) ||
    isMissing(referenceAllele) ||
    isMissing(alternateAllele)
  ) {
    return { outcome: "reject", reason: "missing-field" };
  }

  const trimmedPosition = position.trim();
  if (!DIGITS.test(trimmedPosition)) {
    return { outcome: "reject", reason: "invalid-position" };
  }

  const ref = referenceAllele.trim();
  const alt = alternateAllele.trim();
  if (!isSnvAllele(ref) || !isSnvAllele(alt)) {
    return { outcome: "reject", reason: "not-snv" };
  }

  const coordinates: CoordinateTuple = {
    chromosome: chromosome.trim(),
    position: trimmedPosition,
    referenceAllele: ref.toUpperCase(),
    alternateAllele: alt.toUpperCase(),
  };
  return { outcome: "accept", variationId, key: coordinateKey(coordinates), coordinates };
}
