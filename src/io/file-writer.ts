/**
 * File writing operations using Effect Platform
 *
 * All Effect plumbing is hidden behind Promise-based APIs.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { Cause, Effect, Exit } from "effect";
import { FileError } from "../errors";
import { runWithPlatform } from "./runtime";

/**
 * Handle for writing to a file multiple times within a scope
 *
 * The file is closed when the callback completes or throws.
 */
export interface FileWriteHandle {
  writeString(content: string): Promise<void>;
  writeBytes(content: Uint8Array): Promise<void>;
}

/**
 * Open file for writing and execute callback with write handle
 *
 * Parent directories are created first. The file is truncated on open and
 * closed through Effect's scope when the callback settles. An error thrown
 * by the callback is rethrown unchanged.
 *
 * @throws {FileError} When the file cannot be opened or a write fails
 *
 * @example
 * ```typescript
 * await openForWriting("out/mapping.tsv", async (handle) => {
 *   await handle.writeString("pickle_ID\tChromosome\n");
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>
): Promise<T> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;

    yield* fs
      .makeDirectory(pathService.dirname(path), { recursive: true })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("open", path, error)));

    const file = yield* fs
      .open(path, { flag: "w", mode: 0o644 })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("open", path, error)));

    const encoder = new TextEncoder();
    const writeBytes = async (content: Uint8Array): Promise<void> => {
      const exit = await Effect.runPromiseExit(file.writeAll(content));
      if (Exit.isFailure(exit)) {
        throw FileError.fromSystemError("write", path, Cause.squash(exit.cause));
      }
    };

    const handle: FileWriteHandle = {
      writeString: (content: string) => writeBytes(encoder.encode(content)),
      writeBytes,
    };

    return yield* Effect.tryPromise({
      try: () => callback(handle),
      catch: (error) => error,
    });
  });

  return runWithPlatform(program);
}
