import { InvalidAssumptionError } from "../../core/errors.js";
import { assertFiniteAssumptions } from "../../core/field-path.js";
import {
  requireFiniteFigures,
  requireFraction,
  requirePositive,
  requirePositiveInteger,
} from "../../core/guards.js";
import { isMacrsClass, macrsRate } from "../../core/macrs.js";
import { compoundFactor } from "../../core/math-utils.js";
import { timelineFor } from "../../core/timeline.js";
import { horizonField, horizonOf } from "../../types/inputs.js";
import type { SolarInputs } from "../../types/inputs.js";
import type {
  Projection,
  SolarCapitalCost,
  SolarForecastRow,
  SolarSchedule,
} from "../../types/schedule.js";
import { amortizationAt, buildFinancing } from "../financing/financing-module.js";

const KW_PER_MW = 1_000;

/**
 * Total CapEx grossed up for contingency, the ITC taken on the eligible
 * share, and the depreciable basis (reduced by half the credit). The ITC is
 * a basis reduction: it lowers the financed cost, it is never a year-0 cash
 * inflow.
 */
export function solarCapitalCost(inputs: SolarInputs): SolarCapitalCost {
  const { site, capex, tax } = inputs;

  const perKwDc = capex.module_cost_per_kw + capex.inverter_cost_per_kw + capex.bos_cost_per_kw;
  const hardCost = site.dc_mw * KW_PER_MW * perKwDc;
  const softCost = capex.interconnect_cost + capex.land_cost + capex.development_cost;
  const totalCapex = (hardCost + softCost) * (1 + capex.contingency_percent);

  const itcValue = totalCapex * tax.itc_eligible_fraction * tax.itc_percent;

  return {
    totalCapex,
    itcValue,
    netCapex: totalCapex - itcValue,
    depreciableBasis: totalCapex - itcValue / 2,
  };
}

export function firstYearEnergyMwh(inputs: SolarInputs): number {
  const { site } = inputs;
  return site.ac_mw * site.capacity_factor * site.hours_per_year * site.performance_ratio;
}

function assertSolarInputs(inputs: SolarInputs): void {
  assertFiniteAssumptions(inputs);
  requirePositiveInteger(horizonOf(inputs), horizonField(inputs));
  requirePositive(inputs.site.ac_mw, "site.ac_mw");
  requirePositive(inputs.site.dc_mw, "site.dc_mw");
  requireFraction(inputs.financing.debt_fraction, "financing.debt_fraction");
  const macrsClass: number = inputs.tax.macrs_class;
  if (!isMacrsClass(macrsClass)) {
    throw new InvalidAssumptionError("tax.macrs_class", `${macrsClass} is not a MACRS recovery period`);
  }
}

export function buildSolarSchedule(inputs: SolarInputs): Projection<SolarSchedule> {
  assertSolarInputs(inputs);

  const horizonYears = horizonOf(inputs);
  const { site, operating, revenue, financing: debtInputs, tax } = inputs;
  const timeline = timelineFor(inputs.financial_close_date, horizonYears);

  const capitalCost = solarCapitalCost(inputs);
  const debtPrincipal = capitalCost.netCapex * debtInputs.debt_fraction;

  const financing = buildFinancing({
    principal: debtPrincipal,
    equity: capitalCost.netCapex - debtPrincipal,
    interestRate: debtInputs.debt_interest_rate,
    tenorYears: debtInputs.debt_tenor_years,
    horizonYears,
    fields: {
      principal: "financing.debt_fraction",
      equity: "financing.debt_fraction",
      interestRate: "financing.debt_interest_rate",
      tenorYears: "financing.debt_tenor_years",
    },
  });

  const fixedOm = site.ac_mw * KW_PER_MW * operating.fixed_om_per_kw;
  const baseOperatingCost = fixedOm + operating.insurance_annual + operating.land_lease_annual;

  const rows: SolarForecastRow[] = [];
  let energyMwh = firstYearEnergyMwh(inputs);

  for (let year = 1; year <= horizonYears; year += 1) {
    if (year > 1) {
      energyMwh *= 1 - site.degradation;
    }

    const ppaPrice = revenue.ppa_price * compoundFactor(revenue.ppa_escalator, year - 1);
    const merchantPrice = revenue.merchant_price * compoundFactor(revenue.merchant_escalator, year - 1);
    const contractedRevenue = energyMwh * (1 - revenue.merchant_percentage) * ppaPrice;
    const merchantRevenue = energyMwh * revenue.merchant_percentage * merchantPrice;
    const totalRevenue = contractedRevenue + merchantRevenue;

    const operatingCost = baseOperatingCost * compoundFactor(operating.opex_escalator, year - 1);
    const ebitda = totalRevenue - operatingCost;

    const depreciation = capitalCost.depreciableBasis * macrsRate(tax.macrs_class, year);
    const debt = amortizationAt(financing, year);

    const taxableIncome = ebitda - depreciation - debt.interest;
    // Losses are not carried forward
    const incomeTax = Math.max(taxableIncome, 0) * tax.tax_rate;

    const row: SolarForecastRow = {
      year,
      ...(timeline ? { periodEnding: timeline.yearEnding(year) } : {}),
      output: energyMwh,
      energyMwh,
      ppaPrice,
      merchantPrice,
      contractedRevenue,
      merchantRevenue,
      revenue: totalRevenue,
      operatingCost,
      ebitda,
      depreciation,
      interest: debt.interest,
      principal: debt.principal,
      debtService: debt.debtService,
      taxableIncome,
      tax: incomeTax,
      netIncome: taxableIncome - incomeTax,
      netCashFlow: ebitda - debt.debtService - incomeTax,
    };
    requireFiniteFigures(row);
    rows.push(Object.freeze(row));
  }

  const schedule: SolarSchedule = Object.freeze({
    sector: "solar",
    horizonYears,
    rows: Object.freeze(rows),
    capitalCost: Object.freeze(capitalCost),
  });

  return Object.freeze({ schedule, financing });
}
