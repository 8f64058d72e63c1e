/**
 * Annual Cash Flow Formatter
 *
 * Lays a projection out as a labelled Year 0..N table, the way a lender's
 * pro forma reads: operations, debt, tax, then cash flow to equity.
 */

import type {
  ConsultingForecastRow,
  Projection,
  ProjectionSchedule,
  SolarForecastRow,
} from "../types/schedule.js";

export type AnnualCashFlowFormat = "currency" | "number";

export interface AnnualCashFlowRow {
  label: string;
  values: (number | null)[];
  format: AnnualCashFlowFormat;
  isHeader?: boolean;
  isSubtotal?: boolean;
  isTotal?: boolean;
  indent?: number;
}

export interface AnnualCashFlowTable {
  sector: ProjectionSchedule["sector"];
  years: number[];
  yearLabels: string[];
  yearEnding: (string | null)[];
  rows: AnnualCashFlowRow[];
}

/**
 * Formats a number as currency string
 */
export function formatCurrency(value: number | null | undefined): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return "-";
  const absValue = Math.abs(value);
  const formatted = absValue.toLocaleString("en-US", {
    style: "currency",
    currency: "USD",
    minimumFractionDigits: 0,
    maximumFractionDigits: 0,
  });
  return value < 0 ? `-${formatted}` : formatted;
}

/**
 * Formats a number as percentage string
 */
export function formatPercent(value: number | null | undefined, digits = 2): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return "-";
  return `${(value * 100).toFixed(digits)}%`;
}

export function formatNumber(value: number | null | undefined): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return "-";
  return value.toLocaleString("en-US", { maximumFractionDigits: 0 });
}

export function formatMultiple(value: number | null | undefined): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return "-";
  return `${value.toFixed(2)}x`;
}

function formatValue(value: number | null, format: AnnualCashFlowFormat): string {
  switch (format) {
    case "currency":
      return formatCurrency(value);
    case "number":
      return formatNumber(value);
  }
}

function header(label: string, columns: number): AnnualCashFlowRow {
  return {
    label,
    values: new Array<number | null>(columns).fill(null),
    format: "number",
    isHeader: true,
  };
}

function line(
  label: string,
  year0: number | null,
  operating: number[],
  format: AnnualCashFlowFormat,
  extra: Partial<AnnualCashFlowRow> = {},
): AnnualCashFlowRow {
  return { label, values: [year0, ...operating], format, indent: 1, ...extra };
}

function solarOperatingRows(rows: readonly SolarForecastRow[]): AnnualCashFlowRow[] {
  return [
    line("Energy (MWh)", null, rows.map((r) => r.energyMwh), "number"),
    line("PPA Price ($/MWh)", null, rows.map((r) => r.ppaPrice), "currency"),
    line("Contracted Revenue", null, rows.map((r) => r.contractedRevenue), "currency"),
    line("Merchant Revenue", null, rows.map((r) => r.merchantRevenue), "currency"),
  ];
}

function consultingOperatingRows(rows: readonly ConsultingForecastRow[]): AnnualCashFlowRow[] {
  return [
    line("Billable Hours", null, rows.map((r) => r.billableHours), "number"),
    line("Retainer Revenue", null, rows.map((r) => r.retainerRevenue), "currency"),
    line("Project Revenue", null, rows.map((r) => r.projectRevenue), "currency"),
    line("Salaries", null, rows.map((r) => r.salaryCost), "currency"),
    line("Overhead", null, rows.map((r) => r.overheadCost), "currency"),
  ];
}

/**
 * Main function to generate annual cash flow table
 */
export function generateAnnualCashFlow(projection: Projection): AnnualCashFlowTable {
  const { schedule, financing } = projection;
  const rows: readonly (SolarForecastRow | ConsultingForecastRow)[] = schedule.rows;
  const columns = schedule.horizonYears + 1;

  const years = Array.from({ length: columns }, (_, i) => i);
  const yearLabels = years.map((y) => `Year ${y}`);
  const yearEnding = [null, ...rows.map((r) => r.periodEnding ?? null)];

  const table: AnnualCashFlowRow[] = [header("OPERATIONS", columns)];
  table.push(
    ...(schedule.sector === "solar"
      ? solarOperatingRows(schedule.rows)
      : consultingOperatingRows(schedule.rows)),
  );
  table.push(
    line("Total Revenue", null, rows.map((r) => r.revenue), "currency", { isSubtotal: true }),
    line("Operating Costs", null, rows.map((r) => -r.operatingCost), "currency"),
    line("EBITDA", null, rows.map((r) => r.ebitda), "currency", { isSubtotal: true }),
    header("DEBT", columns),
    line("Debt Proceeds", financing.debtPrincipal, rows.map(() => 0), "currency"),
    line("Interest", null, rows.map((r) => -r.interest), "currency"),
    line("Principal", null, rows.map((r) => -r.principal), "currency"),
    line("Debt Service", null, rows.map((r) => -r.debtService), "currency", { isSubtotal: true }),
    header("TAX", columns),
    line("Depreciation", null, rows.map((r) => r.depreciation), "currency"),
    line("Taxable Income", null, rows.map((r) => r.taxableIncome), "currency"),
    line("Income Tax", null, rows.map((r) => -r.tax), "currency"),
    line("Net Income", null, rows.map((r) => r.netIncome), "currency", { isSubtotal: true }),
    header("CASH FLOW", columns),
    line(
      "Cash Flow to Equity",
      -financing.equityContribution,
      rows.map((r) => r.netCashFlow),
      "currency",
      { isTotal: true },
    ),
  );

  return { sector: schedule.sector, years, yearLabels, yearEnding, rows: table };
}

/**
 * Renders the table as fixed-width text
 */
export function formatAnnualCashFlowAsText(table: AnnualCashFlowTable): string {
  const labelWidth = Math.max(...table.rows.map((r) => (r.indent ?? 0) * 2 + r.label.length), 8);
  const cells = table.rows.map((row) =>
    row.values.map((v) => (row.isHeader ? "" : formatValue(v, row.format))),
  );
  const columnWidth = Math.max(
    ...table.yearLabels.map((l) => l.length),
    ...cells.flat().map((c) => c.length),
  );

  const pad = (text: string) => text.padStart(columnWidth);
  const lines: string[] = [
    ["".padEnd(labelWidth), ...table.yearLabels.map(pad)].join("  "),
  ];

  table.rows.forEach((row, index) => {
    const label = `${"  ".repeat(row.indent ?? 0)}${row.label}`.padEnd(labelWidth);
    if (row.isHeader) {
      lines.push(label);
      return;
    }
    lines.push([label, ...(cells[index] ?? []).map(pad)].join("  "));
  });

  return lines.join("\n");
}

/**
 * Serialises the table for export layers
 */
export function formatAnnualCashFlowAsJson(table: AnnualCashFlowTable): string {
  return JSON.stringify(table, null, 2);
}
