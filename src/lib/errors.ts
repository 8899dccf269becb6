/**
 * Typed errors raised when an action is rejected before any state changes.
 */

export type PlannerErrorCode =
  | "reserved-region"
  | "region-not-found"
  | "replacement-not-found"
  | "invalid-grid"
  | "invalid-argument"

export class PlannerError extends Error {
  readonly code: PlannerErrorCode
  /** Operation that rejected the action, e.g. "editRegion" */
  readonly op: string
  readonly details?: Record<string, unknown>

  constructor(
    code: PlannerErrorCode,
    op: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = "PlannerError"
    this.code = code
    this.op = op
    if (details && typeof details === "object" && !Array.isArray(details)) {
      this.details = details
    }
  }
}

export function isPlannerError(error: unknown): error is PlannerError {
  return error instanceof PlannerError
}
