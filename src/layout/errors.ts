// src/layout/errors.ts

export type ForestErrorCode =
  | "unknown-node" // identity outside [0, len)
  | "index-out-of-range" // child position outside [0, childCount)
  | "missing-edge" // parent/child pair is not linked
  | "dirty-cache-write" // cache stored on a node still marked dirty
  | "invariant-violation"; // checkForest() found a broken invariant

/**
 * Caller-contract violation. Thrown before any state is touched, so the
 * forest is unchanged when one escapes.
 */
export class ForestError extends Error {
  override readonly name = "ForestError";
  readonly code: ForestErrorCode;

  constructor(code: ForestErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ForestError);
    }
  }
}
