/**
 * Write a sample corpus as length-prefixed MessagePack records
 */

import { openForWriting } from "../../io/file-writer";
import { encodeRecord } from "./framing";

/**
 * @returns Number of records written
 * @throws {FileError} If the file cannot be written
 */
export async function writeRecords(
  path: string,
  records: Iterable<unknown> | AsyncIterable<unknown>
): Promise<number> {
  return openForWriting(path, async (handle) => {
    let count = 0;
    for await (const record of records) {
      await handle.writeBytes(encodeRecord(record));
      count++;
    }
    return count;
  });
}
