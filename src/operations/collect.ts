/**
 * Identifier collection from the sample corpus
 *
 * Reads the corpus once, front to back, and keeps the first `maxIds`
 * distinct identifiers it can coerce. Records of any other shape are
 * skipped without complaint.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { RecordParser } from "../formats";
import type { SampleRecord } from "../formats";
import type { VariationId } from "../types";

export const DEFAULT_ID_FIELD = "ID";

// digits may be grouped by single underscores: "1_000"
const INTEGER_TEXT = /^\s*[+-]?[0-9](?:_?[0-9])*\s*$/;
const MAX_SAFE_BIGINT = BigInt(Number.MAX_SAFE_INTEGER);
const asciiDecoder = new TextDecoder("latin1");

export interface CollectOptions {
  /** Stop once this many distinct identifiers are held */
  readonly maxIds: number;
  /** Record field holding the identifier (default: "ID") */
  readonly idField?: string;
  readonly signal?: AbortSignal;
}

export interface ReadRecordsOptions {
  /** Stop after this many records, malformed ones included */
  readonly maxRecords?: number;
  readonly signal?: AbortSignal;
  /** Receives a message for each frame that fails to decode */
  readonly onWarning?: (warning: string) => void;
}

const CollectOptionsSchema = type({
  maxIds: "number.integer>=0",
  "idField?": "string>0",
  "signal?": "unknown",
});

const ReadRecordsOptionsSchema = type({
  "maxRecords?": "number.integer>=0",
  "signal?": "unknown",
  "onWarning?": "Function",
});

/**
 * Coerce a decoded field value to a variation identifier
 *
 * Integers pass through; finite fractions truncate toward zero; booleans
 * count as 1 and 0; bigints convert when within the safe integer range.
 * Strings, and binary values holding ASCII text, convert when they are a
 * signed run of decimal digits. Negative results and every other value
 * yield `undefined`.
 *
 * @example
 * ```typescript
 * coerceVariationId(" 42 ");   // 42
 * coerceVariationId("1_000");  // 1000
 * coerceVariationId(7.9);      // 7
 * coerceVariationId(true);     // 1
 * coerceVariationId("4e2");    // undefined
 * ```
 */
export function coerceVariationId(value: unknown): VariationId | undefined {
  let id: number;

  if (typeof value === "number") {
    if (!Number.isFinite(value)) return undefined;
    id = Math.trunc(value);
  } else if (typeof value === "boolean") {
    id = value ? 1 : 0;
  } else if (typeof value === "bigint") {
    if (value < 0n || value > MAX_SAFE_BIGINT) return undefined;
    id = Number(value);
  } else if (typeof value === "string") {
    return parseIntegerText(value);
  } else if (value instanceof Uint8Array) {
    return parseIntegerText(asciiDecoder.decode(value));
  } else {
    return undefined;
  }

  if (!Number.isSafeInteger(id) || id < 0) return undefined;
  // -0 from "-0" or -0.5
  return id === 0 ? 0 : id;
}

function parseIntegerText(text: string): VariationId | undefined {
  if (!INTEGER_TEXT.test(text)) return undefined;
  const id = Number(text.trim().replaceAll("_", ""));
  if (!Number.isSafeInteger(id) || id < 0) return undefined;
  return id === 0 ? 0 : id;
}

/**
 * Identifier carried by a record, if it has a coercible one
 */
export function identifierOf(record: SampleRecord, idField: string = DEFAULT_ID_FIELD): VariationId | undefined {
  if (record.kind !== "structured" || !Object.hasOwn(record.fields, idField)) {
    return undefined;
  }
  return coerceVariationId(record.fields[idField]);
}

/**
 * Stream classified records from a corpus file
 *
 * @throws {ValidationError} If the options are invalid
 * @throws {FileError} If the file cannot be read
 * @throws {RecordStreamError} If the stream ends inside a record
 */
export async function* readRecords(
  path: string,
  options: ReadRecordsOptions = {}
): AsyncIterable<SampleRecord> {
  const validation = ReadRecordsOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid record reader options: ${validation.summary}`);
  }

  const limit = options.maxRecords ?? Number.POSITIVE_INFINITY;
  if (limit === 0) return;

  const parser = new RecordParser({
    ...(options.signal === undefined ? {} : { signal: options.signal }),
    ...(options.onWarning === undefined ? {} : { onWarning: options.onWarning }),
  });
  let count = 0;
  for await (const record of parser.parseFile(path)) {
    yield record;
    if (++count >= limit) return;
  }
}

/**
 * Collect up to `maxIds` distinct identifiers from a sample corpus
 *
 * Reading stops as soon as the set is full, so records after that point
 * are never decoded.
 *
 * @throws {ValidationError} If the options are invalid
 * @throws {FileError} If the file cannot be read
 * @throws {RecordStreamError} If the stream ends inside a record
 *
 * @example
 * ```typescript
 * const wanted = await collectIdentifiers("samples.msgpack", { maxIds: 50_000 });
 * ```
 */
export async function collectIdentifiers(path: string, options: CollectOptions): Promise<Set<VariationId>> {
  const validation = CollectOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid identifier collection options: ${validation.summary}`);
  }

  const idField = options.idField ?? DEFAULT_ID_FIELD;
  const wanted = new Set<VariationId>();
  if (options.maxIds === 0) return wanted;

  const recordOptions = options.signal === undefined ? {} : { signal: options.signal };
  for await (const record of readRecords(path, recordOptions)) {
    const id = identifierOf(record, idField);
    if (id === undefined) continue;

    wanted.add(id);
    if (wanted.size >= options.maxIds) break;
  }

  return wanted;
}
