/**
 * @module formats/records/parser
 * @description Streaming reader for length-prefixed MessagePack corpora
 *
 * Each frame decodes independently. Frames that decode to anything other
 * than a key-value map, or that fail to decode, are yielded as malformed so
 * callers can skip or count them; only a cut-off stream is fatal. Decode
 * failures reach `onWarning` only when the caller supplies one.
 */

import { decode } from "@msgpack/msgpack";
import { type } from "arktype";
import { FileError, ValidationError, VariantMapError } from "../../errors";
import { createStream } from "../../io/file-reader";
import { AbstractParser } from "../abstract-parser";
import { DEFAULT_MAX_RECORD_SIZE, readFrames } from "./framing";
import type { RecordParserOptions, SampleRecord } from "./types";

const RecordParserOptionsSchema = type({
  "maxRecordSize?": "number.integer>0",
  "signal?": "unknown",
  "onWarning?": "Function",
});

/**
 * True for decoded MessagePack maps
 *
 * Arrays, binary payloads, timestamps and null are not maps.
 */
export function isKeyValueMap(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array) &&
    !(value instanceof Date)
  );
}

/**
 * Classify a decoded value as a structured or malformed record
 */
export function classifyRecord(value: unknown, index: number): SampleRecord {
  if (isKeyValueMap(value)) {
    return { kind: "structured", index, fields: value };
  }
  return { kind: "malformed", index, reason: "not-a-map", value };
}

/**
 * RecordParser - sample corpus reader
 *
 * @example
 * ```typescript
 * const parser = new RecordParser();
 * for await (const record of parser.parseFile('samples.msgpack')) {
 *   if (record.kind === 'structured') console.log(record.fields.VariationID);
 * }
 * ```
 */
export class RecordParser extends AbstractParser<SampleRecord, RecordParserOptions> {
  private source = "<stream>";

  constructor(options: RecordParserOptions = {}) {
    const validation = RecordParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid record parser options: ${validation.summary}`);
    }
    super(options);
  }

  protected getDefaultOptions(): Partial<RecordParserOptions> {
    // undecodable frames are skipped quietly unless the caller listens
    return { maxRecordSize: DEFAULT_MAX_RECORD_SIZE, onWarning: () => {} };
  }

  getFormatName(): string {
    return "MessagePack records";
  }

  /**
   * Read every record of a corpus file, gzip-compressed or not
   *
   * @throws {FileError} If the file cannot be opened or read
   * @throws {RecordStreamError} If the stream ends inside a record
   */
  async *parseFile(path: string): AsyncIterable<SampleRecord> {
    try {
      const { signal } = this.options;
      const stream = await createStream(path, { decompression: signal === undefined ? {} : { signal } });
      this.source = path;
      yield* this.parse(stream);
    } catch (error) {
      if (error instanceof VariantMapError) {
        throw error;
      }
      throw FileError.fromSystemError("read", path, error);
    } finally {
      this.source = "<stream>";
    }
  }

  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<SampleRecord> {
    let index = 0;

    for await (const payload of readFrames(stream, this.source, this.options.maxRecordSize)) {
      this.checkAborted();
      yield this.decodePayload(payload, index);
      index++;
    }
  }

  private decodePayload(payload: Uint8Array, index: number): SampleRecord {
    let value: unknown;
    try {
      value = decode(payload);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.options.onWarning(`record ${index} could not be decoded: ${reason}`);
      return { kind: "malformed", index, reason: "undecodable" };
    }
    return classifyRecord(value, index);
  }
}
