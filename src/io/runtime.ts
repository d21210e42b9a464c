/**
 * Effect platform layer selection
 *
 * All file I/O goes through the @effect/platform FileSystem and Path
 * services. Callers see plain Promises; the Effect plumbing stays here.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";

/**
 * Get the Effect platform layer that provides FileSystem, Path and friends
 *
 * @returns Layer for the Node.js runtime
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run an Effect program against the platform layer and return a Promise
 *
 * Failures are rethrown as the original error value rather than the
 * FiberFailure wrapper `Effect.runPromise` produces, so callers can keep
 * using `instanceof` checks on our error classes.
 *
 * @param program - Effect requiring platform services
 * @returns Promise resolving to the program's value
 */
export async function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<A> {
  const exit = await Effect.runPromiseExit(program.pipe(Effect.provide(getPlatform())));
  return unwrapExit(exit);
}

/**
 * Convert an Exit into a value, throwing the squashed failure
 */
export function unwrapExit<A, E>(exit: Exit.Exit<A, E>): A {
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
