export type ProjectionErrorCode = "INVALID_ASSUMPTION" | "NO_CONVERGENCE";

export abstract class ProjectionError extends Error {
  abstract readonly code: ProjectionErrorCode;
}

/**
 * A structurally valid assumption the engine cannot compute with
 * (zero tenor with debt drawn, zero headcount, horizon below one year...).
 */
export class InvalidAssumptionError extends ProjectionError {
  readonly code = "INVALID_ASSUMPTION";
  readonly field: string;
  readonly reason: string;

  constructor(field: string, reason: string) {
    super(`Invalid assumption ${field}: ${reason}`);
    this.name = "InvalidAssumptionError";
    this.field = field;
    this.reason = reason;
  }
}

/**
 * The IRR solver could not bracket a root. `series` is the cash-flow vector
 * that was handed to the solver.
 */
export class NoConvergenceError extends ProjectionError {
  readonly code = "NO_CONVERGENCE";
  readonly series: readonly number[];

  constructor(series: readonly number[], detail: string) {
    super(`IRR did not converge: ${detail}`);
    this.name = "NoConvergenceError";
    this.series = Object.freeze(Array.from(series));
  }
}

export function isProjectionError(error: unknown): error is InvalidAssumptionError | NoConvergenceError {
  return error instanceof InvalidAssumptionError || error instanceof NoConvergenceError;
}
