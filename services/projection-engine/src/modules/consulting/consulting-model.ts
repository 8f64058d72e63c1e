import { InvalidAssumptionError } from "../../core/errors.js";
import { assertFiniteAssumptions } from "../../core/field-path.js";
import {
  requireFiniteFigures,
  requireNonNegative,
  requirePositive,
  requirePositiveInteger,
} from "../../core/guards.js";
import { compoundFactor } from "../../core/math-utils.js";
import { timelineFor } from "../../core/timeline.js";
import { horizonField, horizonOf } from "../../types/inputs.js";
import type {
  ConsultingInputs,
  ConsultingOverheadInput,
  StaffLevelInput,
  StaffLevelName,
} from "../../types/inputs.js";
import type {
  ConsultingForecastRow,
  ConsultingSchedule,
  Projection,
} from "../../types/schedule.js";
import { amortizationAt, buildFinancing } from "../financing/financing-module.js";

export const STAFF_LEVELS: readonly StaffLevelName[] = ["partners", "managers", "analysts"];

const DAYS_PER_YEAR = 365;

export interface StaffLevelYear {
  billableHours: number;
  revenue: number;
  salaryCost: number;
}

// Collected fees: hours × rate × realization
export function staffLevelYear(
  level: StaffLevelInput,
  standardAnnualHours: number,
  billingFactor: number,
  salaryFactor: number,
): StaffLevelYear {
  const billableHours = level.headcount * standardAnnualHours * level.utilization;
  return {
    billableHours,
    revenue: billableHours * level.billing_rate * billingFactor * level.realization,
    salaryCost: level.headcount * level.salary * salaryFactor,
  };
}

export function totalOverhead(overhead: ConsultingOverheadInput): number {
  return overhead.rent + overhead.software + overhead.marketing + overhead.travel + overhead.admin;
}

export function totalHeadcount(inputs: ConsultingInputs): number {
  return STAFF_LEVELS.reduce((sum, level) => sum + inputs.staffing[level].headcount, 0);
}

function assertConsultingInputs(inputs: ConsultingInputs): void {
  assertFiniteAssumptions(inputs);
  requirePositiveInteger(horizonOf(inputs), horizonField(inputs));
  requirePositive(inputs.staffing.standard_annual_hours, "staffing.standard_annual_hours");
  for (const level of STAFF_LEVELS) {
    requireNonNegative(inputs.staffing[level].headcount, `staffing.${level}.headcount`);
  }
  if (totalHeadcount(inputs) === 0) {
    throw new InvalidAssumptionError("staffing.headcount", "the firm has no staff to bill");
  }
}

export function buildConsultingSchedule(inputs: ConsultingInputs): Projection<ConsultingSchedule> {
  assertConsultingInputs(inputs);

  const horizonYears = horizonOf(inputs);
  const { staffing, growth, working_capital: workingCapital, tax } = inputs;
  const timeline = timelineFor(inputs.financial_close_date, horizonYears);

  const financing = buildFinancing({
    principal: inputs.financing.debt_amount,
    equity: inputs.financing.equity_investment,
    interestRate: inputs.financing.debt_interest_rate,
    tenorYears: inputs.financing.debt_tenor_years,
    horizonYears,
    fields: {
      principal: "financing.debt_amount",
      equity: "financing.equity_investment",
      interestRate: "financing.debt_interest_rate",
      tenorYears: "financing.debt_tenor_years",
    },
  });

  const baseOverhead = totalOverhead(inputs.overhead);
  const receivableDays = workingCapital.wip_days + workingCapital.ar_days;

  const rows: ConsultingForecastRow[] = [];
  let priorNetWorkingCapital = 0;

  for (let year = 1; year <= horizonYears; year += 1) {
    const billingFactor = compoundFactor(growth.billing_rate_escalator, year - 1);
    const salaryFactor = compoundFactor(growth.salary_escalator, year - 1);

    let billableHours = 0;
    let revenue = 0;
    let salaryCost = 0;
    for (const level of STAFF_LEVELS) {
      const levelYear = staffLevelYear(
        staffing[level],
        staffing.standard_annual_hours,
        billingFactor,
        salaryFactor,
      );
      billableHours += levelYear.billableHours;
      revenue += levelYear.revenue;
      salaryCost += levelYear.salaryCost;
    }

    const retainerRevenue = revenue * inputs.revenue_mix.retainer_fraction;
    const overheadCost = baseOverhead * compoundFactor(growth.overhead_escalator, year - 1);
    const operatingCost = salaryCost + overheadCost;
    const ebitda = revenue - operatingCost;

    const debt = amortizationAt(financing, year);
    const taxableIncome = ebitda - debt.interest;
    const incomeTax = Math.max(taxableIncome, 0) * tax.tax_rate;
    const netIncome = taxableIncome - incomeTax;

    // WIP and receivables tie up cash, payables release it
    const netWorkingCapital =
      (revenue * receivableDays) / DAYS_PER_YEAR -
      (operatingCost * workingCapital.ap_days) / DAYS_PER_YEAR;
    const workingCapitalChange = netWorkingCapital - priorNetWorkingCapital;
    priorNetWorkingCapital = netWorkingCapital;

    const row: ConsultingForecastRow = {
      year,
      ...(timeline ? { periodEnding: timeline.yearEnding(year) } : {}),
      output: billableHours,
      billableHours,
      retainerRevenue,
      projectRevenue: revenue - retainerRevenue,
      revenue,
      salaryCost,
      overheadCost,
      operatingCost,
      ebitda,
      depreciation: 0,
      interest: debt.interest,
      principal: debt.principal,
      debtService: debt.debtService,
      taxableIncome,
      tax: incomeTax,
      netIncome,
      netWorkingCapital,
      workingCapitalChange,
      netCashFlow: netIncome - debt.principal - workingCapitalChange,
    };
    requireFiniteFigures(row);
    rows.push(Object.freeze(row));
  }

  const schedule: ConsultingSchedule = Object.freeze({
    sector: "consulting",
    horizonYears,
    rows: Object.freeze(rows),
    revenuePerHead: (rows[0]?.revenue ?? 0) / totalHeadcount(inputs),
  });

  return Object.freeze({ schedule, financing });
}
