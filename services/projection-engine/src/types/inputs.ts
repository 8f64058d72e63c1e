import type { MacrsClass } from "../core/macrs.js";

export type Sector = "solar" | "consulting";

interface ProjectInputsBase {
  readonly sector: Sector;
  readonly project_name: string;
  readonly financial_close_date?: string; // ISO date; labels forecast rows when present
}

// ---------------------------------------------------------------------------
// Solar
// ---------------------------------------------------------------------------

export interface SolarSiteInput {
  readonly ac_mw: number;
  readonly dc_mw: number;
  readonly capacity_factor: number;
  readonly performance_ratio: number;
  readonly hours_per_year: number;
  readonly degradation: number;
}

export interface SolarCapexInput {
  // per kW-DC
  readonly module_cost_per_kw: number;
  readonly inverter_cost_per_kw: number;
  readonly bos_cost_per_kw: number;
  readonly interconnect_cost: number;
  readonly land_cost: number;
  readonly development_cost: number;
  readonly contingency_percent: number;
}

export interface SolarOperatingInput {
  readonly fixed_om_per_kw: number; // per kW-AC per year
  readonly insurance_annual: number;
  readonly land_lease_annual: number;
  readonly opex_escalator: number;
}

export interface SolarRevenueInput {
  readonly ppa_price: number; // per MWh
  readonly ppa_escalator: number;
  readonly merchant_percentage: number;
  readonly merchant_price: number;
  readonly merchant_escalator: number;
}

export interface SolarFinancingInput {
  readonly debt_fraction: number;
  readonly debt_interest_rate: number;
  readonly debt_tenor_years: number;
  readonly equity_return_target: number;
}

export interface SolarTaxInput {
  readonly tax_rate: number;
  readonly itc_percent: number;
  readonly itc_eligible_fraction: number;
  readonly macrs_class: MacrsClass;
}

export interface SolarInputs extends ProjectInputsBase {
  readonly sector: "solar";
  readonly project_life_years: number;
  readonly site: SolarSiteInput;
  readonly capex: SolarCapexInput;
  readonly operating: SolarOperatingInput;
  readonly revenue: SolarRevenueInput;
  readonly financing: SolarFinancingInput;
  readonly tax: SolarTaxInput;
}

// ---------------------------------------------------------------------------
// Consulting
// ---------------------------------------------------------------------------

export interface StaffLevelInput {
  readonly headcount: number;
  readonly billing_rate: number; // per hour
  readonly salary: number; // per year
  readonly utilization: number;
  readonly realization: number;
}

export type StaffLevelName = "partners" | "managers" | "analysts";

export interface ConsultingStaffingInput {
  readonly partners: StaffLevelInput;
  readonly managers: StaffLevelInput;
  readonly analysts: StaffLevelInput;
  readonly standard_annual_hours: number;
}

export interface ConsultingRevenueMixInput {
  readonly retainer_fraction: number;
}

export interface ConsultingOverheadInput {
  readonly rent: number;
  readonly software: number;
  readonly marketing: number;
  readonly travel: number;
  readonly admin: number;
}

export interface ConsultingGrowthInput {
  readonly billing_rate_escalator: number;
  readonly salary_escalator: number;
  readonly overhead_escalator: number;
}

export interface WorkingCapitalInput {
  readonly wip_days: number;
  readonly ar_days: number;
  readonly ap_days: number;
}

export interface ConsultingFinancingInput {
  readonly equity_investment: number;
  readonly debt_amount: number;
  readonly debt_interest_rate: number;
  readonly debt_tenor_years: number;
  readonly equity_return_target: number;
}

export interface ConsultingTaxInput {
  readonly tax_rate: number;
}

export interface ConsultingInputs extends ProjectInputsBase {
  readonly sector: "consulting";
  readonly analysis_years: number;
  readonly staffing: ConsultingStaffingInput;
  readonly revenue_mix: ConsultingRevenueMixInput;
  readonly overhead: ConsultingOverheadInput;
  readonly growth: ConsultingGrowthInput;
  readonly working_capital: WorkingCapitalInput;
  readonly financing: ConsultingFinancingInput;
  readonly tax: ConsultingTaxInput;
}

export type ProjectInputs = SolarInputs | ConsultingInputs;

export type InputsFor<S extends Sector> = Extract<ProjectInputs, { sector: S }>;

export function horizonOf(inputs: ProjectInputs): number {
  switch (inputs.sector) {
    case "solar":
      return inputs.project_life_years;
    case "consulting":
      return inputs.analysis_years;
  }
}

export function horizonField(inputs: ProjectInputs): string {
  switch (inputs.sector) {
    case "solar":
      return "project_life_years";
    case "consulting":
      return "analysis_years";
  }
}
