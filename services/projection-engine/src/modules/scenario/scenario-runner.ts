import { InvalidAssumptionError, isProjectionError, NoConvergenceError } from "../../core/errors.js";
import type { ProjectionErrorCode } from "../../core/errors.js";
import { getAssumption, scaleAssumption } from "../../core/field-path.js";
import type { NumericPath } from "../../core/field-path.js";
import { buildSchedule } from "../../engine/build-schedule.js";
import type { ProjectInputs } from "../../types/inputs.js";
import type { SummaryTotals } from "../../types/schedule.js";
import { debtCoverage, equityIrr, summary } from "../metrics/metric-reducer.js";

export interface ScenarioFailure {
  name: string;
  code: ProjectionErrorCode;
  message: string;
  field?: string;
  series?: readonly number[];
}

export interface ScenarioSuccess {
  success: true;
  multiplier: number;
  fieldValue: number;
  equityIrr: number;
  minDscr: number | null;
  totals: SummaryTotals;
}

export interface ScenarioError {
  success: false;
  multiplier: number;
  error: ScenarioFailure;
}

export type ScenarioResult = ScenarioSuccess | ScenarioError;

// One entry per multiplier, in input order
export type ScenarioSet = readonly ScenarioResult[];

function describeFailure(error: InvalidAssumptionError | NoConvergenceError): ScenarioFailure {
  if (error instanceof InvalidAssumptionError) {
    return { name: error.name, code: error.code, message: error.message, field: error.field };
  }
  return { name: error.name, code: error.code, message: error.message, series: error.series };
}

function runScenario<T extends ProjectInputs>(
  inputs: T,
  field: NumericPath<T> & string,
  multiplier: number,
): ScenarioSuccess {
  const scaled = scaleAssumption(inputs, field, multiplier);
  const { schedule, financing } = buildSchedule(scaled);

  return {
    success: true,
    multiplier,
    fieldValue: getAssumption(scaled, field),
    equityIrr: equityIrr(schedule, financing),
    minDscr: debtCoverage(schedule).minDscr,
    totals: summary(schedule),
  };
}

/**
 * Re-runs the full pipeline once per multiplier applied to `field`.
 *
 * Scenarios share nothing, so one failing with an InvalidAssumptionError or
 * NoConvergenceError is recorded against that entry while the rest still
 * run. Any other error propagates.
 */
export function runScenarios<T extends ProjectInputs>(
  inputs: T,
  field: NumericPath<T> & string,
  multipliers: readonly number[],
): ScenarioSet {
  const results = multipliers.map((multiplier): ScenarioResult => {
    try {
      return runScenario(inputs, field, multiplier);
    } catch (error) {
      if (!isProjectionError(error)) {
        throw error;
      }
      return { success: false, multiplier, error: describeFailure(error) };
    }
  });

  return Object.freeze(results);
}
