/**
 * Sample corpus inspection
 *
 * Summarizes the first records of a corpus: what kinds of values they
 * decode to, which keys the maps carry, how the identifier and label fields
 * are typed, how embeddings are packed, and which keys hold null or NaN.
 */

import { basename } from "node:path";
import { type } from "arktype";
import { ValidationError } from "../errors";
import type { SampleRecord } from "../formats";
import { isKeyValueMap } from "../formats";
import { DEFAULT_ID_FIELD, readRecords } from "./collect";

export const DEFAULT_INSPECT_OPTIONS = {
  maxRecords: 500,
  idField: DEFAULT_ID_FIELD,
  idSamples: 10,
  labelField: "Pathogenicity",
  labelSamples: 20,
  embeddingField: "Embedding",
  embeddingLayer: "36",
} as const;

export const DEFAULT_MAX_KEYS_PRINT = 200;

const TOP_PREFIXES = 10;
const TOP_LABEL_VALUES = 30;
const TOP_MISSING = 30;
const NUMERIC_KEY_PREVIEW = 10;
const KEYS_HEAD = 80;
const KEYS_TAIL = 20;
const NUMERIC_KEY = /^[+-]?[0-9]+(?:\.[0-9]+)?$/;

export interface InspectOptions {
  readonly maxRecords?: number;
  readonly idField?: string;
  readonly idSamples?: number;
  /** Field whose values are tallied, e.g. a pathogenicity label */
  readonly labelField?: string;
  readonly labelSamples?: number;
  /** Field holding per-layer embeddings */
  readonly embeddingField?: string;
  /** Embedding entry whose shapes are counted */
  readonly embeddingLayer?: string;
  /** Receives a message for each record that fails to decode */
  readonly onWarning?: (warning: string) => void;
}

export const InspectOptionsSchema = type({
  "maxRecords?": "number.integer>=0",
  "idField?": "string>0",
  "idSamples?": "number.integer>=0",
  "labelField?": "string>0",
  "labelSamples?": "number.integer>=0",
  "embeddingField?": "string>0",
  "embeddingLayer?": "string>0",
  "onWarning?": "Function",
});

export interface FormatInspectionOptions {
  /** Longer key lists print only their head and tail */
  readonly maxKeysPrint?: number;
}

const FormatInspectionOptionsSchema = type({
  "maxKeysPrint?": "number.integer>=0",
});

/** Label and count, most frequent first */
export type Tally = readonly (readonly [label: string, count: number])[];

export interface FieldProfile {
  readonly field: string;
  /** Structured records carrying the field */
  readonly occurrences: number;
  readonly valueTypes: Tally;
  readonly samples: readonly unknown[];
}

export interface LabelProfile extends FieldProfile {
  readonly topValues: Tally;
}

export interface EmbeddingProfile {
  readonly field: string;
  readonly layer: string;
  readonly containerTypes: Tally;
  /** Keys of map-shaped containers */
  readonly keys: Tally;
  /** Shapes of the `layer` entry of map-shaped containers */
  readonly layerShapes: Tally;
}

export interface CorpusInspection {
  readonly path: string;
  readonly recordsSampled: number;
  readonly recordTypes: Tally;
  /** Sorted union of map keys, pair lists included */
  readonly keys: readonly string[];
  readonly keyPrefixes: Tally;
  readonly numericKeys: {
    readonly count: number;
    readonly preview: readonly string[];
  };
  readonly label: LabelProfile;
  readonly id: FieldProfile;
  readonly embedding: EmbeddingProfile;
  readonly missingByKey: Tally;
}

/**
 * Name of a decoded value's type as reported by the inspector
 */
export function valueTypeName(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (typeof value === "number") return Number.isInteger(value) ? "integer" : "float";
  if (typeof value === "string" || typeof value === "boolean" || typeof value === "bigint") {
    return typeof value;
  }
  if (value instanceof Uint8Array) return "binary";
  if (value instanceof Date) return "timestamp";
  if (Array.isArray(value)) return "array";
  return "map";
}

function recordTypeName(record: SampleRecord): string {
  if (record.kind === "structured") return "map";
  return record.reason === "undecodable" ? "undecodable" : valueTypeName(record.value);
}

function isNullOrNaN(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === "number" && Number.isNaN(value));
}

/**
 * Prefix before the first underscore, or the whole key
 */
export function keyPrefix(key: string): string {
  const cut = key.indexOf("_");
  return cut === -1 ? key : key.slice(0, cut);
}

/**
 * Keys of a list of `[key, value]` pairs, or undefined for any other value
 */
export function pairListKeys(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;

  const keys: string[] = [];
  for (const entry of value) {
    if (!Array.isArray(entry) || entry.length !== 2) return undefined;
    const [key] = entry;
    if (typeof key !== "string" && typeof key !== "number") return undefined;
    keys.push(String(key));
  }
  return keys;
}

/**
 * Dimensions of a nested array, rendered as `[d0, d1, ...]`
 *
 * Only arrays have a shape; anything else is `<no-shape>`.
 */
export function shapeOf(value: unknown): string {
  if (!Array.isArray(value)) return "<no-shape>";

  const dims: number[] = [];
  let current: unknown = value;
  while (Array.isArray(current)) {
    dims.push(current.length);
    current = current[0];
  }
  return `[${dims.join(", ")}]`;
}

class Counter {
  private readonly counts = new Map<string, number>();

  add(label: string): void {
    this.counts.set(label, (this.counts.get(label) ?? 0) + 1);
  }

  // ties keep first-seen order
  mostCommon(limit: number = Number.POSITIVE_INFINITY): Tally {
    return [...this.counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, limit);
  }
}

class FieldTracker {
  occurrences = 0;
  readonly types = new Counter();
  readonly values = new Counter();
  readonly samples: unknown[] = [];

  constructor(
    readonly field: string,
    private readonly maxSamples: number
  ) {}

  observe(fields: Readonly<Record<string, unknown>>): void {
    if (!Object.hasOwn(fields, this.field)) return;
    const value = fields[this.field];
    this.occurrences++;
    this.types.add(valueTypeName(value));
    this.values.add(typeof value === "string" ? value : formatValue(value));
    if (this.samples.length < this.maxSamples) this.samples.push(value);
  }

  profile(): FieldProfile {
    return {
      field: this.field,
      occurrences: this.occurrences,
      valueTypes: this.types.mostCommon(),
      samples: this.samples,
    };
  }
}

/**
 * Sample the first records of a corpus and summarize them
 *
 * @throws {ValidationError} If the options are invalid
 * @throws {FileError} If the file cannot be read
 * @throws {RecordStreamError} If the stream ends inside a sampled record
 */
export async function inspectCorpus(path: string, options: InspectOptions = {}): Promise<CorpusInspection> {
  const validation = InspectOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid inspect options: ${validation.summary}`);
  }
  const maxRecords = options.maxRecords ?? DEFAULT_INSPECT_OPTIONS.maxRecords;
  const embeddingField = options.embeddingField ?? DEFAULT_INSPECT_OPTIONS.embeddingField;
  const embeddingLayer = options.embeddingLayer ?? DEFAULT_INSPECT_OPTIONS.embeddingLayer;

  const id = new FieldTracker(
    options.idField ?? DEFAULT_INSPECT_OPTIONS.idField,
    options.idSamples ?? DEFAULT_INSPECT_OPTIONS.idSamples
  );
  const label = new FieldTracker(
    options.labelField ?? DEFAULT_INSPECT_OPTIONS.labelField,
    options.labelSamples ?? DEFAULT_INSPECT_OPTIONS.labelSamples
  );
  const recordTypes = new Counter();
  const missing = new Counter();
  const containerTypes = new Counter();
  const embeddingKeys = new Counter();
  const layerShapes = new Counter();
  const keyUnion = new Set<string>();
  let recordsSampled = 0;

  const readOptions =
    options.onWarning === undefined ? { maxRecords } : { maxRecords, onWarning: options.onWarning };
  for await (const record of readRecords(path, readOptions)) {
    recordsSampled++;
    recordTypes.add(recordTypeName(record));

    if (record.kind !== "structured") {
      const pairKeys = record.reason === "not-a-map" ? pairListKeys(record.value) : undefined;
      for (const key of pairKeys ?? []) keyUnion.add(key);
      continue;
    }

    for (const [key, value] of Object.entries(record.fields)) {
      keyUnion.add(key);
      if (isNullOrNaN(value)) missing.add(key);
    }

    label.observe(record.fields);
    id.observe(record.fields);

    if (Object.hasOwn(record.fields, embeddingField)) {
      const embedding = record.fields[embeddingField];
      containerTypes.add(valueTypeName(embedding));
      if (isKeyValueMap(embedding)) {
        for (const key of Object.keys(embedding)) embeddingKeys.add(key);
        if (Object.hasOwn(embedding, embeddingLayer)) {
          layerShapes.add(shapeOf(embedding[embeddingLayer]));
        }
      }
    }
  }

  const keys = [...keyUnion].sort();
  const prefixes = new Counter();
  for (const key of keys) prefixes.add(keyPrefix(key));
  const numericKeys = keys.filter((key) => NUMERIC_KEY.test(key)).sort((a, b) => Number(a) - Number(b));

  return {
    path,
    recordsSampled,
    recordTypes: recordTypes.mostCommon(),
    keys,
    keyPrefixes: prefixes.mostCommon(TOP_PREFIXES),
    numericKeys: { count: numericKeys.length, preview: numericKeys.slice(0, NUMERIC_KEY_PREVIEW) },
    label: { ...label.profile(), topValues: label.values.mostCommon(TOP_LABEL_VALUES) },
    id: id.profile(),
    embedding: {
      field: embeddingField,
      layer: embeddingLayer,
      containerTypes: containerTypes.mostCommon(),
      keys: embeddingKeys.mostCommon(),
      layerShapes: layerShapes.mostCommon(),
    },
    missingByKey: missing.mostCommon(TOP_MISSING),
  };
}

/**
 * Render a decoded value for display
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (typeof value === "bigint") return `${value}n`;
  if (value instanceof Uint8Array) return `<binary ${value.length} bytes>`;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return `<array of ${value.length}>`;
  if (isKeyValueMap(value)) return `<map of ${Object.keys(value).length} keys>`;
  return String(value);
}

function tallyLines(tally: Tally, indent: string): string[] {
  return tally.map(([label, count]) => `${indent}${label}: ${count}`);
}

function keyLines(keys: readonly string[], maxKeysPrint: number): string[] {
  if (keys.length <= maxKeysPrint) {
    return [`Union of map keys (${keys.length}):`, ...keys.map((key) => `  ${key}`)];
  }
  const head = keys.slice(0, KEYS_HEAD);
  const tail = keys.slice(Math.max(KEYS_HEAD, keys.length - KEYS_TAIL));
  return [
    `Union of map keys (${keys.length}); first ${head.length}:`,
    ...head.map((key) => `  ${key}`),
    "  ...",
    ...tail.map((key) => `  ${key}`),
  ];
}

/**
 * Render an inspection as report lines
 *
 * @throws {ValidationError} If the options are invalid
 */
export function formatInspection(
  inspection: CorpusInspection,
  options: FormatInspectionOptions = {}
): string[] {
  const validation = FormatInspectionOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid format options: ${validation.summary}`);
  }
  const maxKeysPrint = options.maxKeysPrint ?? DEFAULT_MAX_KEYS_PRINT;

  const lines: string[] = [
    `=== ${basename(inspection.path)} ===`,
    `Records sampled: ${inspection.recordsSampled}`,
    "Record types (count):",
    ...tallyLines(inspection.recordTypes, "  "),
  ];

  if (inspection.keys.length > 0) {
    lines.push("", ...keyLines(inspection.keys, maxKeysPrint));
    lines.push("Top key prefixes (prefix: count):", ...tallyLines(inspection.keyPrefixes, "  "));
    const { numericKeys } = inspection;
    if (numericKeys.count > 0) {
      lines.push(`Numeric-named keys: ${numericKeys.count}`);
      lines.push(`  Preview: ${numericKeys.preview.join(", ")}`);
    }
  }

  const { label } = inspection;
  if (label.occurrences > 0) {
    lines.push("", `${label.field}:`, "  Value types:", ...tallyLines(label.valueTypes, "    "));
    lines.push(`  Unique values (top ${TOP_LABEL_VALUES}):`, ...tallyLines(label.topValues, "    "));
    lines.push(`  Samples (first ${label.samples.length}):`);
    lines.push(...label.samples.map((value) => `    ${formatValue(value)}`));
  }

  const { id } = inspection;
  if (id.occurrences > 0) {
    lines.push("", `${id.field}:`, "  Value types:", ...tallyLines(id.valueTypes, "    "));
    lines.push(`  Samples (first ${id.samples.length}):`);
    lines.push(...id.samples.map((value) => `    ${formatValue(value)}`));
  }

  const { embedding } = inspection;
  if (embedding.containerTypes.length > 0) {
    lines.push("", `${embedding.field}:`, "  Container types:");
    lines.push(...tallyLines(embedding.containerTypes, "    "));
    if (embedding.keys.length > 0) {
      lines.push("  Map keys (key: count):", ...tallyLines(embedding.keys, "    "));
    }
    if (embedding.layerShapes.length > 0) {
      lines.push(`  Shapes of ${embedding.field}["${embedding.layer}"]:`);
      lines.push(...tallyLines(embedding.layerShapes, "    "));
    }
  }

  if (inspection.missingByKey.length > 0) {
    lines.push("", `Missing values (null/NaN) per key (top ${TOP_MISSING}):`);
    lines.push(...tallyLines(inspection.missingByKey, "  "));
  }

  return lines;
}
