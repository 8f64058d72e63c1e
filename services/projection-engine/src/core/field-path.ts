import { InvalidAssumptionError } from "./errors.js";

/**
 * Dot-separated paths to every numeric leaf of an input record, e.g.
 * `"revenue.ppa_price"` or `"staffing.analysts.utilization"`.
 */
export type NumericPath<T> = T extends number
  ? never
  : {
      [K in keyof T & string]-?: NonNullable<T[K]> extends number
        ? K
        : NonNullable<T[K]> extends object
          ? `${K}.${NumericPath<NonNullable<T[K]>>}`
          : never;
    }[keyof T & string];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function deepFreeze<T>(value: T): T {
  if (isRecord(value) || Array.isArray(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function splitPath(path: string): string[] {
  const segments = path.split(".");
  if (segments.some((s) => s.length === 0)) {
    throw new InvalidAssumptionError(path, "is not a valid field path");
  }
  return segments;
}

function parentOf(root: unknown, segments: readonly string[], path: string): Record<string, unknown> {
  let node: unknown = root;
  for (const segment of segments.slice(0, -1)) {
    if (!isRecord(node) || !(segment in node)) {
      throw new InvalidAssumptionError(path, "is not an assumption of this record");
    }
    node = node[segment];
  }
  if (!isRecord(node)) {
    throw new InvalidAssumptionError(path, "is not an assumption of this record");
  }
  return node;
}

export function getAssumption(inputs: object, path: string): number {
  const segments = splitPath(path);
  const leaf = segments[segments.length - 1] ?? "";
  const value = parentOf(inputs, segments, path)[leaf];
  if (typeof value !== "number") {
    throw new InvalidAssumptionError(path, "is not a numeric assumption");
  }
  return value;
}

/** Returns a new frozen record with one numeric leaf replaced. */
export function withAssumption<T extends object>(
  inputs: T,
  path: NumericPath<T> & string,
  value: number,
): T {
  getAssumption(inputs, path);

  const next = structuredClone(inputs);
  const segments = splitPath(path);
  const leaf = segments[segments.length - 1] ?? "";
  parentOf(next, segments, path)[leaf] = value;
  return deepFreeze(next);
}

export function scaleAssumption<T extends object>(
  inputs: T,
  path: NumericPath<T> & string,
  multiplier: number,
): T {
  if (!Number.isFinite(multiplier)) {
    throw new InvalidAssumptionError(path, `multiplier must be a finite number (got ${multiplier})`);
  }
  return withAssumption(inputs, path, getAssumption(inputs, path) * multiplier);
}

// [path, value] for every numeric leaf, depth first in declaration order
export function numericLeaves(value: unknown, prefix = ""): [string, number][] {
  if (!isRecord(value)) {
    return [];
  }
  const leaves: [string, number][] = [];
  for (const [key, child] of Object.entries(value)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (typeof child === "number") {
      leaves.push([path, child]);
    } else {
      leaves.push(...numericLeaves(child, path));
    }
  }
  return leaves;
}

export function assertFiniteAssumptions(inputs: object): void {
  for (const [path, value] of numericLeaves(inputs)) {
    if (!Number.isFinite(value)) {
      throw new InvalidAssumptionError(path, "must be a finite number");
    }
  }
}

export function isNumericPath<T extends object>(inputs: T, path: string): path is NumericPath<T> & string {
  return numericLeaves(inputs).some(([leaf]) => leaf === path);
}
