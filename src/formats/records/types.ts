/**
 * Sample corpus record types
 */

import type { ParserOptions } from "../../types";

/**
 * A record decoded to a key-value map
 */
export interface StructuredRecord {
  readonly kind: "structured";
  /** Zero-based position in the stream */
  readonly index: number;
  readonly fields: Readonly<Record<string, unknown>>;
}

/**
 * A record that is not a key-value map, or whose payload did not decode
 */
export interface MalformedRecord {
  readonly kind: "malformed";
  readonly index: number;
  readonly reason: "not-a-map" | "undecodable";
  /** Decoded value when the payload decoded but was not a map */
  readonly value?: unknown;
}

export type SampleRecord = StructuredRecord | MalformedRecord;

export interface RecordParserOptions extends ParserOptions {
  /** Frames larger than this are treated as corruption (default: 1GiB) */
  maxRecordSize?: number;
}
