// errors/index.ts
// Single entry for the errors module: exports + small helpers.

import { AppError, type ErrorDetails } from "./boundary.js";

export type { ErrorKind, ErrorDetails } from "./boundary.js";
export { AppError, makeError, toAppError, runWithBoundary } from "./boundary.js";

export {
  isObject,
  isString,
  isArray,
  invariant,
  expectString,
  expectObject,
  expectArray,
} from "./guards.js";

/* ===================== Misc predicates ===================== */

export function isAppError(e: unknown): e is AppError {
  return e instanceof AppError;
}

/** Pull the captured command output off an error, if a shell step produced one. */
export function commandOutput(e: unknown): string | undefined {
  if (!isAppErrorWithDetails(e)) return undefined;
  const output = e.details.output;
  return typeof output === "string" && output.length > 0 ? output : undefined;
}

function isAppErrorWithDetails(e: unknown): e is AppError & { details: ErrorDetails } {
  return isAppError(e) && e.details !== undefined;
}
