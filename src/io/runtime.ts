/**
 * Effect platform layer and program runner
 *
 * All file access goes through `@effect/platform`'s `FileSystem`, provided
 * here by the Node.js platform layer.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";

/**
 * Get the Effect platform layer providing FileSystem and Path
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a fully provided Effect program as a Promise
 *
 * Unlike `Effect.runPromise`, the rejection is the failure itself rather than
 * a fiber wrapper, so callers can match on error classes.
 */
export async function runEffect<A, E>(program: Effect.Effect<A, E>): Promise<A> {
  const exit = await Effect.runPromiseExit(program);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
