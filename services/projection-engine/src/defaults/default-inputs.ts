import { deepFreeze } from "../core/field-path.js";
import type { ConsultingInputs, InputsFor, Sector, SolarInputs } from "../types/inputs.js";

export const DEFAULT_SOLAR_INPUTS: SolarInputs = deepFreeze({
  sector: "solar",
  project_name: "Example 100 MW Solar PV",
  financial_close_date: "2026-01-01",
  project_life_years: 25,
  site: {
    ac_mw: 100,
    dc_mw: 130,
    capacity_factor: 0.25,
    performance_ratio: 1,
    hours_per_year: 8760,
    degradation: 0.005,
  },
  capex: {
    module_cost_per_kw: 350,
    inverter_cost_per_kw: 60,
    bos_cost_per_kw: 200,
    interconnect_cost: 5_000_000,
    land_cost: 1_500_000,
    development_cost: 3_000_000,
    contingency_percent: 0.08,
  },
  operating: {
    fixed_om_per_kw: 23,
    insurance_annual: 200_000,
    land_lease_annual: 250_000,
    opex_escalator: 0.02,
  },
  revenue: {
    ppa_price: 30,
    ppa_escalator: 0.02,
    merchant_percentage: 0.1,
    merchant_price: 40,
    merchant_escalator: 0,
  },
  financing: {
    debt_fraction: 0.6,
    debt_interest_rate: 0.05,
    debt_tenor_years: 18,
    equity_return_target: 0.12,
  },
  tax: {
    tax_rate: 0.26,
    itc_percent: 0.3,
    itc_eligible_fraction: 1,
    macrs_class: 5,
  },
});

export const DEFAULT_CONSULTING_INPUTS: ConsultingInputs = deepFreeze({
  sector: "consulting",
  project_name: "Example Advisory Partners",
  financial_close_date: "2026-01-01",
  analysis_years: 5,
  staffing: {
    partners: { headcount: 3, billing_rate: 350, salary: 250_000, utilization: 0.6, realization: 0.9 },
    managers: { headcount: 6, billing_rate: 250, salary: 150_000, utilization: 0.7, realization: 0.9 },
    analysts: { headcount: 12, billing_rate: 150, salary: 90_000, utilization: 0.8, realization: 0.85 },
    standard_annual_hours: 52 * 40,
  },
  revenue_mix: {
    retainer_fraction: 0.6,
  },
  overhead: {
    rent: 300_000,
    software: 100_000,
    marketing: 200_000,
    travel: 150_000,
    admin: 400_000,
  },
  growth: {
    billing_rate_escalator: 0.03,
    salary_escalator: 0.03,
    overhead_escalator: 0.02,
  },
  working_capital: {
    wip_days: 30,
    ar_days: 45,
    ap_days: 15,
  },
  financing: {
    equity_investment: 1_000_000,
    debt_amount: 0,
    debt_interest_rate: 0,
    debt_tenor_years: 0,
    equity_return_target: 0.15,
  },
  tax: {
    tax_rate: 0.26,
  },
});

const DEFAULTS: { [S in Sector]: InputsFor<S> } = {
  solar: DEFAULT_SOLAR_INPUTS,
  consulting: DEFAULT_CONSULTING_INPUTS,
};

/** Canonical example record for a sector; frozen, so "edits" go through withAssumption. */
export function defaultInputs<S extends Sector>(sector: S): InputsFor<S> {
  return DEFAULTS[sector];
}
