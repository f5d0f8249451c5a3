/**
 * packages/core/src/errors.ts — Deterministic error codes for the bar runtime.
 *
 * Only configuration and lifecycle violations are thrown. Per-module, drawing
 * and interaction failures are absorbed where they happen and only reported
 * through the logger; their codes are used as log bindings.
 */

export type StripbarErrorCode =
  | "STRIPBAR_INVALID_CONFIG"
  | "STRIPBAR_INVALID_EVENT"
  | "STRIPBAR_REENTRANT_CALL"
  | "STRIPBAR_DISPOSED"
  | "STRIPBAR_MODULE_FAILURE"
  | "STRIPBAR_DRAW_FAILURE"
  | "STRIPBAR_BACKGROUND_TASK_FAILURE";

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class StripbarError extends Error {
  override readonly name = "StripbarError";
  readonly code: StripbarErrorCode;

  constructor(code: StripbarErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StripbarError);
    }
  }
}

/** Format a thrown value for log messages. */
export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}

export function invalidConfig(detail: string): never {
  throw new StripbarError("STRIPBAR_INVALID_CONFIG", detail);
}
