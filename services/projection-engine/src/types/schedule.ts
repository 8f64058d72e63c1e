import type { Sector } from "./inputs.js";

/** One forecast year. `year` counts operating years from financial close (1..N). */
export interface ForecastRow {
  readonly year: number;
  readonly periodEnding?: string;
  readonly output: number; // MWh or billable hours
  readonly revenue: number;
  readonly operatingCost: number;
  readonly ebitda: number;
  readonly depreciation: number;
  readonly interest: number;
  readonly principal: number;
  readonly debtService: number;
  readonly taxableIncome: number;
  readonly tax: number;
  readonly netIncome: number;
  readonly netCashFlow: number; // to equity
}

export interface SolarForecastRow extends ForecastRow {
  readonly energyMwh: number;
  readonly ppaPrice: number;
  readonly merchantPrice: number;
  readonly contractedRevenue: number;
  readonly merchantRevenue: number;
}

export interface ConsultingForecastRow extends ForecastRow {
  readonly billableHours: number;
  readonly retainerRevenue: number;
  readonly projectRevenue: number;
  readonly salaryCost: number;
  readonly overheadCost: number;
  readonly netWorkingCapital: number;
  readonly workingCapitalChange: number;
}

export interface SolarCapitalCost {
  readonly totalCapex: number;
  readonly itcValue: number;
  readonly netCapex: number;
  readonly depreciableBasis: number;
}

interface ScheduleBase<S extends Sector, R extends ForecastRow> {
  readonly sector: S;
  readonly horizonYears: number;
  readonly rows: readonly R[];
}

export interface SolarSchedule extends ScheduleBase<"solar", SolarForecastRow> {
  readonly capitalCost: SolarCapitalCost;
}

export interface ConsultingSchedule extends ScheduleBase<"consulting", ConsultingForecastRow> {
  readonly revenuePerHead: number;
}

export type ProjectionSchedule = SolarSchedule | ConsultingSchedule;

export interface AmortizationRow {
  readonly year: number;
  readonly openingBalance: number;
  readonly interest: number;
  readonly principal: number;
  readonly debtService: number;
  readonly closingBalance: number;
}

export interface FinancingStructure {
  readonly debtPrincipal: number;
  readonly equityContribution: number;
  readonly interestRate: number;
  readonly tenorYears: number;
  readonly annualPayment: number;
  readonly amortization: readonly AmortizationRow[];
}

export interface Projection<S extends ProjectionSchedule = ProjectionSchedule> {
  readonly schedule: S;
  readonly financing: FinancingStructure;
}

export interface SummaryTotals {
  readonly totalRevenue: number;
  readonly totalOperatingCost: number;
  readonly totalEbitda: number;
  readonly totalDepreciation: number;
  readonly totalTax: number;
  readonly totalNetIncome: number;
  readonly totalDebtService: number;
  readonly totalNetCashFlow: number;
}

export interface DebtCoverage {
  readonly minDscr: number | null;
  readonly averageDscr: number | null;
}

export interface ProjectMetrics {
  readonly equityIrr: number;
  readonly equityReturnTarget: number;
  readonly equityNpv: number; // discounted at the target
  readonly equityMultiple: number | null;
  readonly paybackYear: number | null;
  readonly debtCoverage: DebtCoverage;
  readonly totals: SummaryTotals;
}
