// errors/boundary.ts
// Centralized error boundary + typed error helpers

export type ErrorKind =
  | "Config"
  | "Data"
  | "Validation"
  | "Command"
  | "Transfer"
  | "Runtime"
  | "Unknown";

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly details?: ErrorDetails;

  constructor(kind: ErrorKind, message: string, cause?: unknown, details?: ErrorDetails) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = `${kind}Error`;
    this.kind = kind;
    this.details = details;
  }
}

/**
 * Factory for creating typed errors
 */
export function makeError(
  kind: ErrorKind,
  msg: string,
  cause?: unknown,
  details?: ErrorDetails
): AppError {
  return new AppError(kind, msg, cause, details);
}

/**
 * Normalize unknown errors into AppError
 */
export function toAppError(e: unknown, fallbackKind: ErrorKind = "Unknown"): AppError {
  if (e instanceof AppError) return e;
  if (e === null || e === undefined) return makeError(fallbackKind, "Unknown error (null/undefined)");
  if (typeof e === "string") return makeError(fallbackKind, e);
  if (e instanceof Error) return makeError(fallbackKind, e.message, e);
  return makeError(fallbackKind, "Non-error thrown", e, { value: e });
}

/**
 * Error boundary runner: catches, normalizes, logs, rethrows.
 * Without `rethrow` the failure is reported and `undefined` comes back.
 */
export async function runWithBoundary<T>(
  fn: () => Promise<T>,
  opts: { kind?: ErrorKind; rethrow?: boolean; logger?: (err: AppError) => void } = {}
): Promise<T | undefined> {
  try {
    return await fn();
  } catch (e) {
    const err = toAppError(e, opts.kind ?? "Unknown");
    if (opts.logger) opts.logger(err);
    if (opts.rethrow) throw err;
    return undefined;
  }
}
