import { requireRate } from "../../core/guards.js";
import { irr, npv } from "../../core/math-utils.js";
import type { ProjectInputs } from "../../types/inputs.js";
import type {
  DebtCoverage,
  FinancingStructure,
  ForecastRow,
  ProjectMetrics,
  Projection,
  ProjectionSchedule,
  SummaryTotals,
} from "../../types/schedule.js";

function rowsOf(schedule: ProjectionSchedule): readonly ForecastRow[] {
  return schedule.rows;
}

function sumOf(rows: readonly ForecastRow[], pick: (row: ForecastRow) => number): number {
  let total = 0;
  for (const row of rows) {
    total += pick(row);
  }
  return total;
}

/** Year 0 equity outlay followed by each year's cash flow to equity. */
export function equityCashFlows(schedule: ProjectionSchedule, financing: FinancingStructure): number[] {
  return [-financing.equityContribution, ...rowsOf(schedule).map((row) => row.netCashFlow)];
}

/**
 * Equity IRR. Throws NoConvergenceError (carrying the series) when the
 * equity cash flows never change sign or no root lies in [-99%, 1000%].
 */
export function equityIrr(schedule: ProjectionSchedule, financing: FinancingStructure): number {
  return irr(equityCashFlows(schedule, financing));
}

export function equityNpv(
  schedule: ProjectionSchedule,
  financing: FinancingStructure,
  discountRate: number,
): number {
  return npv(discountRate, equityCashFlows(schedule, financing));
}

export function equityMultiple(schedule: ProjectionSchedule, financing: FinancingStructure): number | null {
  if (financing.equityContribution <= 0) {
    return null;
  }
  return sumOf(rowsOf(schedule), (row) => row.netCashFlow) / financing.equityContribution;
}

// First year in which cumulative equity cash flow turns non-negative
export function paybackYear(schedule: ProjectionSchedule, financing: FinancingStructure): number | null {
  let cumulative = -financing.equityContribution;
  for (const row of rowsOf(schedule)) {
    cumulative += row.netCashFlow;
    if (cumulative >= 0) {
      return row.year;
    }
  }
  return null;
}

export function summary(schedule: ProjectionSchedule): SummaryTotals {
  const rows = rowsOf(schedule);
  return Object.freeze({
    totalRevenue: sumOf(rows, (r) => r.revenue),
    totalOperatingCost: sumOf(rows, (r) => r.operatingCost),
    totalEbitda: sumOf(rows, (r) => r.ebitda),
    totalDepreciation: sumOf(rows, (r) => r.depreciation),
    totalTax: sumOf(rows, (r) => r.tax),
    totalNetIncome: sumOf(rows, (r) => r.netIncome),
    totalDebtService: sumOf(rows, (r) => r.debtService),
    totalNetCashFlow: sumOf(rows, (r) => r.netCashFlow),
  });
}

/** DSCR = EBITDA / debt service, over the years that carry debt service. */
export function debtCoverage(schedule: ProjectionSchedule): DebtCoverage {
  const ratios = rowsOf(schedule)
    .filter((row) => row.debtService > 0)
    .map((row) => row.ebitda / row.debtService);

  if (ratios.length === 0) {
    return { minDscr: null, averageDscr: null };
  }

  return {
    minDscr: Math.min(...ratios),
    averageDscr: ratios.reduce((sum, r) => sum + r, 0) / ratios.length,
  };
}

export function computeMetrics(projection: Projection, inputs: ProjectInputs): ProjectMetrics {
  const { schedule, financing } = projection;
  const target = requireRate(inputs.financing.equity_return_target, "financing.equity_return_target");

  return Object.freeze({
    equityIrr: equityIrr(schedule, financing),
    equityReturnTarget: target,
    equityNpv: equityNpv(schedule, financing, target),
    equityMultiple: equityMultiple(schedule, financing),
    paybackYear: paybackYear(schedule, financing),
    debtCoverage: Object.freeze(debtCoverage(schedule)),
    totals: summary(schedule),
  });
}
