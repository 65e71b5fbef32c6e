/**
 * Length-prefixed record framing
 *
 * Each record is a 4-byte big-endian unsigned payload length followed by a
 * MessagePack payload. A stream ending on a frame boundary is complete; any
 * leftover bytes mean the last record was cut short.
 */

import { encode } from "@msgpack/msgpack";
import { RecordStreamError } from "../../errors";

export const FRAME_HEADER_BYTES = 4;
export const DEFAULT_MAX_RECORD_SIZE = 1_073_741_824;

/**
 * Encode one record as a framed payload
 */
export function encodeRecord(value: unknown): Uint8Array {
  const payload = encode(value);
  const frame = new Uint8Array(FRAME_HEADER_BYTES + payload.length);
  new DataView(frame.buffer).setUint32(0, payload.length, false);
  frame.set(payload, FRAME_HEADER_BYTES);
  return frame;
}

/**
 * Split a byte stream into record payloads
 *
 * @param source - Label used in errors, usually the file path
 * @throws {RecordStreamError} If the stream ends inside a frame or a frame
 *   declares a length above `maxRecordSize`
 */
export async function* readFrames(
  stream: ReadableStream<Uint8Array>,
  source: string,
  maxRecordSize: number = DEFAULT_MAX_RECORD_SIZE
): AsyncIterable<Uint8Array> {
  const reader = stream.getReader();
  let buffer = new Uint8Array(0);
  let offset = 0;
  let framesRead = 0;
  let exhausted = false;
  let sourceFailed = false;

  try {
    while (true) {
      while (buffer.length - offset >= FRAME_HEADER_BYTES) {
        const length = new DataView(buffer.buffer, buffer.byteOffset + offset, FRAME_HEADER_BYTES).getUint32(0, false);
        if (length > maxRecordSize) {
          throw new RecordStreamError(
            `Record length ${length} exceeds maximum ${maxRecordSize}`,
            source,
            framesRead,
            "The file is probably not a length-prefixed record stream"
          );
        }
        const end = offset + FRAME_HEADER_BYTES + length;
        if (end > buffer.length) break;

        yield buffer.subarray(offset + FRAME_HEADER_BYTES, end);
        framesRead++;
        offset = end;
      }

      const { done, value } = await reader.read().catch((error: unknown) => {
        sourceFailed = true;
        throw error;
      });
      if (done) {
        exhausted = true;
        break;
      }

      const remaining = buffer.length - offset;
      const merged = new Uint8Array(remaining + value.length);
      merged.set(buffer.subarray(offset));
      merged.set(value, remaining);
      buffer = merged;
      offset = 0;
    }

    const leftover = buffer.length - offset;
    if (leftover > 0) {
      throw new RecordStreamError(
        `Stream ended inside a record (${leftover} trailing bytes)`,
        source,
        framesRead
      );
    }
  } finally {
    // stopped before the end of the source: release the file
    if (!exhausted && !sourceFailed) await reader.cancel();
    reader.releaseLock();
  }
}
