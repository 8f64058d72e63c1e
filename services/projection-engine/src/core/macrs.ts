import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

import { isRecord } from "./field-path.js";

export type MacrsClass = 3 | 5 | 7 | 10 | 15 | 20;

export const MACRS_CLASSES: readonly MacrsClass[] = [3, 5, 7, 10, 15, 20];

interface MacrsTableFile {
  convention: string;
  unit: "percent";
  classes: Record<string, number[]>;
}

let tables: ReadonlyMap<MacrsClass, readonly number[]> | null = null;

function isMacrsTableFile(value: unknown): value is MacrsTableFile {
  if (!isRecord(value) || value.unit !== "percent" || typeof value.convention !== "string") {
    return false;
  }
  if (!isRecord(value.classes)) {
    return false;
  }
  return Object.values(value.classes).every(
    (rates) => Array.isArray(rates) && rates.every((r) => typeof r === "number" && Number.isFinite(r)),
  );
}

function loadTables(): ReadonlyMap<MacrsClass, readonly number[]> {
  if (tables) {
    return tables;
  }

  const rootDir = join(dirname(fileURLToPath(import.meta.url)), "..", "..", "..", "..");
  const tablePath = join(rootDir, "data", "macrs_half_year.json");
  const parsed: unknown = JSON.parse(readFileSync(tablePath, "utf8"));
  if (!isMacrsTableFile(parsed)) {
    throw new Error(`Malformed MACRS table at ${tablePath}`);
  }

  const loaded = new Map<MacrsClass, readonly number[]>();
  for (const macrsClass of MACRS_CLASSES) {
    const percents = parsed.classes[String(macrsClass)];
    if (!percents) {
      throw new Error(`MACRS table is missing class ${macrsClass}`);
    }
    loaded.set(macrsClass, Object.freeze(percents.map((p) => p / 100)));
  }

  tables = loaded;
  return loaded;
}

export function isMacrsClass(value: number): value is MacrsClass {
  return MACRS_CLASSES.some((c) => c === value);
}

// Fractions of depreciable basis per tax year, year 1 first
export function macrsSchedule(macrsClass: MacrsClass): readonly number[] {
  const schedule = loadTables().get(macrsClass);
  if (!schedule) {
    throw new Error(`MACRS class ${macrsClass} is not tabulated`);
  }
  return schedule;
}

export function macrsRate(macrsClass: MacrsClass, year: number): number {
  if (!Number.isInteger(year) || year < 1) {
    throw new RangeError("year must be a positive integer");
  }
  return macrsSchedule(macrsClass)[year - 1] ?? 0;
}
