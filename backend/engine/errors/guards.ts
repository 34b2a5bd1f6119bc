// errors/guards.ts
// Type guards + invariant helpers for safer runtime checks

import { makeError, type ErrorDetails, type ErrorKind } from "./boundary.js";

// --------- Type Guards ---------

export function isObject(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

export function isString(v: unknown): v is string {
  return typeof v === "string";
}

export function isArray(v: unknown): v is unknown[] {
  return Array.isArray(v);
}

// --------- Invariant helpers ---------

/**
 * Asserts a condition and throws typed error if violated
 */
export function invariant(
  cond: unknown,
  msg: string,
  kind: ErrorKind = "Runtime",
  details?: ErrorDetails
): asserts cond {
  if (!cond) {
    throw makeError(kind, msg, undefined, details);
  }
}

/**
 * Narrow a value, or throw
 */
export function expectString(
  v: unknown,
  msg = "Expected string"
): string {
  invariant(isString(v) && v.length > 0, msg, "Config", { value: v });
  return v;
}

export function expectObject(
  v: unknown,
  msg = "Expected object"
): Record<string, unknown> {
  invariant(isObject(v), msg, "Config", { value: v });
  return v;
}

export function expectArray(
  v: unknown,
  msg = "Expected array"
): unknown[] {
  invariant(isArray(v), msg, "Config", { value: v });
  return v;
}
