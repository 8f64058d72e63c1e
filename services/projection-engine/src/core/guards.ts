import { InvalidAssumptionError } from "./errors.js";
import { numericLeaves } from "./field-path.js";

export function requireFinite(value: number, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidAssumptionError(field, "must be a finite number");
  }
  return value;
}

export function requirePositive(value: number, field: string): number {
  requireFinite(value, field);
  if (value <= 0) {
    throw new InvalidAssumptionError(field, `must be greater than 0 (got ${value})`);
  }
  return value;
}

export function requireNonNegative(value: number, field: string): number {
  requireFinite(value, field);
  if (value < 0) {
    throw new InvalidAssumptionError(field, `must not be negative (got ${value})`);
  }
  return value;
}

export function requirePositiveInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidAssumptionError(field, `must be a positive whole number (got ${value})`);
  }
  return value;
}

export function requireFraction(value: number, field: string): number {
  requireFinite(value, field);
  if (value < 0 || value > 1) {
    throw new InvalidAssumptionError(field, `must be between 0 and 1 (got ${value})`);
  }
  return value;
}

export function requireRate(value: number, field: string): number {
  requireFinite(value, field);
  if (value <= -1) {
    throw new InvalidAssumptionError(field, `must be greater than -100% (got ${value})`);
  }
  return value;
}

// Derived figures stay finite; the whole record is blamed since no single input is
export function requireFiniteFigures(figures: { year: number }, field = "inputs"): void {
  for (const [name, value] of numericLeaves(figures)) {
    if (!Number.isFinite(value)) {
      throw new InvalidAssumptionError(field, `yield a non-finite ${name} in year ${figures.year}`);
    }
  }
}
