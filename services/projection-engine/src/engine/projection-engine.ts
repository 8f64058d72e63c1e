import { getSector } from "sector-registry";

import { isProjectionError } from "../core/errors.js";
import type { InvalidAssumptionError, NoConvergenceError } from "../core/errors.js";
import { formatCurrency, formatMultiple, formatPercent } from "../formatters/annual-cashflow.js";
import { computeMetrics } from "../modules/metrics/metric-reducer.js";
import type { ProjectInputs } from "../types/inputs.js";
import type { ProjectMetrics, Projection } from "../types/schedule.js";
import { parseInputs } from "../validate/validate.js";
import { buildSchedule } from "./build-schedule.js";

export const MIN_LENDER_DSCR = 1.2;

export interface ProjectionEngineResult {
  success: boolean;
  inputs?: ProjectInputs;
  projection?: Projection;
  metrics?: ProjectMetrics;
  errors?: string[];
  error?: InvalidAssumptionError | NoConvergenceError;
  warnings: string[];
}

export class ProjectionEngine {
  /**
   * Run the full pipeline: schedule, financing, then metrics
   */
  run(inputs: ProjectInputs): ProjectionEngineResult {
    let projection: Projection;
    let metrics: ProjectMetrics;
    try {
      projection = buildSchedule(inputs);
      metrics = computeMetrics(projection, inputs);
    } catch (e) {
      if (!isProjectionError(e)) {
        throw e;
      }
      return { success: false, inputs, errors: [e.message], error: e, warnings: [] };
    }

    return {
      success: true,
      inputs,
      projection,
      metrics,
      warnings: this.collectWarnings(projection, metrics),
    };
  }

  /**
   * Validate a `{ contract, inputs }` request and run it
   */
  runRequest(request: unknown): ProjectionEngineResult {
    const parsed = parseInputs(request);
    if (!parsed.success) {
      return { success: false, errors: parsed.errors, warnings: [] };
    }
    return this.run(parsed.inputs);
  }

  private collectWarnings(projection: Projection, metrics: ProjectMetrics): string[] {
    const warnings: string[] = [];
    const rows: readonly { taxableIncome: number }[] = projection.schedule.rows;

    const lossYears = rows.filter((row) => row.taxableIncome < 0).length;
    if (lossYears > 0) {
      warnings.push(`Tax floored to zero in ${lossYears} loss year(s); losses are not carried forward`);
    }

    if (metrics.equityIrr < metrics.equityReturnTarget) {
      warnings.push(
        `Equity IRR of ${formatPercent(metrics.equityIrr)} is below the ${formatPercent(metrics.equityReturnTarget)} target`,
      );
    }

    const { minDscr } = metrics.debtCoverage;
    if (minDscr !== null && minDscr < MIN_LENDER_DSCR) {
      warnings.push(
        `Minimum DSCR of ${minDscr.toFixed(2)}x is below typical lender requirements (${MIN_LENDER_DSCR.toFixed(2)}x)`,
      );
    }

    if (metrics.equityMultiple !== null && metrics.equityMultiple < 1.0) {
      warnings.push("Equity multiple is below 1.0x - investor will lose money");
    }

    return warnings;
  }
}

/**
 * Create a summary report from projection engine results
 */
export function createSummaryReport(result: ProjectionEngineResult): string {
  if (!result.success || !result.inputs || !result.projection || !result.metrics) {
    return `Projection Failed:\n${result.errors?.join("\n") ?? "Unknown error"}`;
  }

  const inputs = result.inputs;
  const { schedule, financing } = result.projection;
  const m = result.metrics;
  const sector = getSector(inputs.sector);

  const lines: string[] = [
    "=".repeat(60),
    `PROJECTION SUMMARY: ${inputs.project_name}`,
    "=".repeat(60),
    "",
    "SECTOR",
    `  ${sector.label} (${sector.contractVersion})`,
    `  Horizon: ${schedule.horizonYears} years`,
    "",
  ];

  if (schedule.sector === "solar") {
    const cost = schedule.capitalCost;
    lines.push(
      "CAPITAL COST",
      `  Total Capex: ${formatCurrency(cost.totalCapex)}`,
      `  ITC: ${formatCurrency(cost.itcValue)}`,
      `  Net Capex: ${formatCurrency(cost.netCapex)}`,
      `  Depreciable Basis: ${formatCurrency(cost.depreciableBasis)}`,
      "",
    );
  } else {
    lines.push("STAFFING", `  Revenue per Head: ${formatCurrency(schedule.revenuePerHead)}`, "");
  }

  lines.push(
    "FINANCING",
    `  Debt: ${formatCurrency(financing.debtPrincipal)}`,
    `  Equity: ${formatCurrency(financing.equityContribution)}`,
    `  Interest Rate: ${formatPercent(financing.interestRate)}`,
    `  Tenor: ${financing.tenorYears} years`,
    "",
    "RETURNS",
    `  Equity IRR: ${formatPercent(m.equityIrr)}`,
    `  Target: ${formatPercent(m.equityReturnTarget)}`,
    `  Equity NPV @ Target: ${formatCurrency(m.equityNpv)}`,
    `  Equity Multiple: ${formatMultiple(m.equityMultiple)}`,
    `  Payback Year: ${m.paybackYear ?? "-"}`,
    "",
    "DEBT",
    `  Min DSCR: ${formatMultiple(m.debtCoverage.minDscr)}`,
    `  Avg DSCR: ${formatMultiple(m.debtCoverage.averageDscr)}`,
    "",
    "TOTALS",
    `  Revenue: ${formatCurrency(m.totals.totalRevenue)}`,
    `  EBITDA: ${formatCurrency(m.totals.totalEbitda)}`,
    `  Tax: ${formatCurrency(m.totals.totalTax)}`,
    `  Net Cash Flow: ${formatCurrency(m.totals.totalNetCashFlow)}`,
  );

  if (result.warnings.length > 0) {
    lines.push("");
    lines.push("WARNINGS");
    for (const warning of result.warnings) {
      lines.push(`  ⚠️ ${warning}`);
    }
  }

  lines.push("");
  lines.push("=".repeat(60));

  return lines.join("\n");
}
