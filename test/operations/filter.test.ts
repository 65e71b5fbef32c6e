/**
 * Reference row filter tests
 */

import { describe, expect, test } from "vitest";
import {
  coordinateKey,
  filterReferenceRow,
  isMissing,
  isSnvAllele,
  parseIntegerField,
} from "../../src/operations";
import type { ReferenceRow } from "../../src/types";

const WANTED: ReadonlySet<number> = new Set([10, 20]);

function row(overrides: Partial<Record<string, string | undefined>> = {}): ReferenceRow {
  return {
    VariationID: "10",
    Assembly: "GRCh38",
    Chromosome: "1",
    PositionVCF: "12345",
    ReferenceAlleleVCF: "A",
    AlternateAlleleVCF: "G",
    ...overrides,
  };
}

describe("field helpers", () => {
  test("isMissing recognises blanks and placeholder tokens", () => {
    for (const value of [undefined, "", "  ", "na", "NA", "n/a", "N/A", "nan", "NaN", "none", " None "]) {
      expect(isMissing(value)).toBe(true);
    }
    for (const value of ["0", "-", "null", "1"]) {
      expect(isMissing(value)).toBe(false);
    }
  });

  test("isSnvAllele accepts single bases in either case", () => {
    expect(["A", "c", "G", "t"].every(isSnvAllele)).toBe(true);
    expect(["N", "AG", "", "-"].some(isSnvAllele)).toBe(false);
  });

  test("parseIntegerField accepts signed integers with surrounding whitespace", () => {
    expect(parseIntegerField(" 10 ")).toBe(10);
    expect(parseIntegerField("+3")).toBe(3);
    expect(parseIntegerField("-3")).toBe(-3);
    expect(parseIntegerField("-0")).toBe(0);
    expect(parseIntegerField("1.0")).toBeUndefined();
    expect(parseIntegerField("")).toBeUndefined();
    expect(parseIntegerField(undefined)).toBeUndefined();
    expect(parseIntegerField("99999999999999999999")).toBeUndefined();
  });

  test("coordinateKey joins with underscores", () => {
    expect(
      coordinateKey({ chromosome: "X", position: "5", referenceAllele: "C", alternateAllele: "T" })
    ).toBe("X_5_C_T");
  });
});

describe("filterReferenceRow", () => {
  test("accepts a valid SNV row and normalises it", () => {
    const verdict = filterReferenceRow(
      row({ Chromosome: " 1 ", PositionVCF: " 12345 ", ReferenceAlleleVCF: "a", AlternateAlleleVCF: " g" }),
      WANTED,
      "GRCh38"
    );

    expect(verdict).toEqual({
      outcome: "accept",
      variationId: 10,
      key: "1_12345_A_G",
      coordinates: { chromosome: "1", position: "12345", referenceAllele: "A", alternateAllele: "G" },
    });
  });

  test("rejects rows whose VariationID is not an integer", () => {
    expect(filterReferenceRow(row({ VariationID: "ten" }), WANTED, "")).toEqual({
      outcome: "reject",
      reason: "invalid-id",
    });
    expect(filterReferenceRow(row({ VariationID: undefined }), WANTED, "")).toEqual({
      outcome: "reject",
      reason: "invalid-id",
    });
  });

  test("skips unwanted identifiers before looking at anything else", () => {
    expect(filterReferenceRow(row({ VariationID: "30", ReferenceAlleleVCF: "AG" }), WANTED, "GRCh38")).toEqual({
      outcome: "skip",
      variationId: 30,
    });
  });

  test("rejects multi-nucleotide alleles even when everything else is valid", () => {
    expect(filterReferenceRow(row({ ReferenceAlleleVCF: "AG" }), WANTED, "GRCh38")).toEqual({
      outcome: "reject",
      reason: "not-snv",
    });
    expect(filterReferenceRow(row({ AlternateAlleleVCF: "N" }), WANTED, "GRCh38")).toEqual({
      outcome: "reject",
      reason: "not-snv",
    });
  });

  test("applies the assembly filter only when both sides are non-empty", () => {
    expect(filterReferenceRow(row({ Assembly: "GRCh37" }), WANTED, "GRCh38")).toEqual({
      outcome: "reject",
      reason: "assembly-mismatch",
    });
    expect(filterReferenceRow(row({ Assembly: "" }), WANTED, "GRCh38").outcome).toBe("accept");
    expect(filterReferenceRow(row({ Assembly: undefined }), WANTED, "GRCh38").outcome).toBe("accept");
    expect(filterReferenceRow(row({ Assembly: " GRCh38 " }), WANTED, "GRCh38").outcome).toBe("accept");
    expect(filterReferenceRow(row({ Assembly: "GRCh37" }), WANTED, "").outcome).toBe("accept");
  });

  test("rejects rows with missing coordinate fields", () => {
    for (const column of ["Chromosome", "PositionVCF", "ReferenceAlleleVCF", "AlternateAlleleVCF"]) {
      expect(filterReferenceRow(row({ [column]: "na" }), WANTED, "").outcome).toBe("reject");
      expect(filterReferenceRow(row({ [column]: undefined }), WANTED, "")).toEqual({
        outcome: "reject",
        reason: "missing-field",
      });
    }
  });

  test("rejects positions that are not plain digits", () => {
    for (const position of ["-1", "12.5", "1e3", "+5", "١٢"]) {
      expect(filterReferenceRow(row({ PositionVCF: position }), WANTED, "")).toEqual({
        outcome: "reject",
        reason: "invalid-position",
      });
    }
  });

  test("checks run in order: assembly before missing fields before alleles", () => {
    expect(
      filterReferenceRow(row({ Assembly: "GRCh37", Chromosome: "", ReferenceAlleleVCF: "AG" }), WANTED, "GRCh38")
    ).toEqual({ outcome: "reject", reason: "assembly-mismatch" });
    expect(filterReferenceRow(row({ PositionVCF: "x", ReferenceAlleleVCF: "na" }), WANTED, "")).toEqual({
      outcome: "reject",
      reason: "missing-field",
    });
  });
});
