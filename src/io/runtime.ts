/**
 * Effect platform layer and runner for file I/O
 *
 * File access goes through @effect/platform services; this module supplies
 * the Node.js layer and turns a finished Effect back into a Promise while
 * keeping the original failure as the rejection value.
 */

import type { FileSystem, Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";
import type { Scope } from "effect";

/**
 * Platform layer providing FileSystem, Path and friends
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a platform program to completion
 *
 * Scoped resources (open file handles) are released before the promise
 * settles. A failure rejects with the error the program failed with, not
 * with Effect's fiber wrapper, so callers can match on error classes.
 *
 * @example
 * ```typescript
 * const size = await runWithPlatform(
 *   Effect.gen(function* () {
 *     const fs = yield* FileSystem.FileSystem;
 *     return (yield* fs.stat("variants.tsv.gz")).size;
 *   })
 * );
 * ```
 */
export async function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, FileSystem.FileSystem | Path.Path | Scope.Scope>
): Promise<A> {
  const exit = await Effect.runPromiseExit(
    program.pipe(Effect.scoped, Effect.provide(getPlatform()))
  );
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
