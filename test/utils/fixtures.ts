/**
 * Temporary-file fixtures for corpus tests
 */

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "fflate";
import { encodeRecord } from "../../src/formats/records";

export interface TempDir {
  readonly root: string;
  path(name: string): string;
  cleanup(): Promise<void>;
}

export async function makeTempDir(): Promise<TempDir> {
  const root = await mkdtemp(join(tmpdir(), "variant-id-mapper-"));
  return {
    root,
    path: (name) => join(root, name),
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

/**
 * Frame every record and concatenate the frames
 */
export function recordStream(records: readonly unknown[]): Uint8Array {
  const frames = records.map((record) => encodeRecord(record));
  const out = new Uint8Array(frames.reduce((total, frame) => total + frame.length, 0));
  let offset = 0;
  for (const frame of frames) {
    out.set(frame, offset);
    offset += frame.length;
  }
  return out;
}

export async function writeRecordFile(path: string, records: readonly unknown[]): Promise<string> {
  await writeFile(path, recordStream(records));
  return path;
}

/**
 * Tab-join rows into a table, `\n` after every row
 */
export function tsv(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => `${row.join("\t")}\n`).join("");
}

export async function writeGzipText(path: string, text: string): Promise<string> {
  await writeFile(path, gzipSync(new TextEncoder().encode(text)));
  return path;
}

export async function readText(path: string): Promise<string> {
  return readFile(path, "utf8");
}

export function bytesStream(...chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller): void {
      for (const chunk of chunks) controller.enqueue(chunk);
      controller.close();
    },
  });
}

export function textStream(...chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return bytesStream(...chunks.map((chunk) => encoder.encode(chunk)));
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

export const REFERENCE_HEADER = [
  "#AlleleID",
  "Type",
  "VariationID",
  "Assembly",
  "Chromosome",
  "PositionVCF",
  "ReferenceAlleleVCF",
  "AlternateAlleleVCF",
] as const;

/**
 * One reference row in REFERENCE_HEADER column order
 */
export function referenceRow(
  variationId: string,
  assembly: string,
  chromosome: string,
  position: string,
  ref: string,
  alt: string
): string[] {
  return ["1", "single nucleotide variant", variationId, assembly, chromosome, position, ref, alt];
}
