// Core primitives
export { ProjectionError, InvalidAssumptionError, NoConvergenceError, isProjectionError } from "./core/errors.js";
export type { ProjectionErrorCode } from "./core/errors.js";
export { pmt, npv, irr, compoundFactor, hasSignChange, IRR_MIN_RATE, IRR_MAX_RATE } from "./core/math-utils.js";
export { Timeline, timelineFor } from "./core/timeline.js";
export type { TimelineConfig } from "./core/timeline.js";
export { MACRS_CLASSES, isMacrsClass, macrsSchedule, macrsRate } from "./core/macrs.js";
export type { MacrsClass } from "./core/macrs.js";
export {
  getAssumption,
  withAssumption,
  scaleAssumption,
  numericLeaves,
  isNumericPath,
  assertFiniteAssumptions,
} from "./core/field-path.js";
export type { NumericPath } from "./core/field-path.js";

// Types (all type-only exports)
export type {
  Sector,
  SolarInputs,
  SolarSiteInput,
  SolarCapexInput,
  SolarOperatingInput,
  SolarRevenueInput,
  SolarFinancingInput,
  SolarTaxInput,
  ConsultingInputs,
  StaffLevelInput,
  StaffLevelName,
  ConsultingStaffingInput,
  ConsultingRevenueMixInput,
  ConsultingOverheadInput,
  ConsultingGrowthInput,
  WorkingCapitalInput,
  ConsultingFinancingInput,
  ConsultingTaxInput,
  ProjectInputs,
  InputsFor,
} from "./types/inputs.js";
export { horizonOf, horizonField } from "./types/inputs.js";
export type {
  ForecastRow,
  SolarForecastRow,
  ConsultingForecastRow,
  SolarCapitalCost,
  SolarSchedule,
  ConsultingSchedule,
  ProjectionSchedule,
  AmortizationRow,
  FinancingStructure,
  Projection,
  SummaryTotals,
  DebtCoverage,
  ProjectMetrics,
} from "./types/schedule.js";

// Modules
export { buildFinancing, amortizationAt } from "./modules/financing/financing-module.js";
export type { DebtTerms } from "./modules/financing/financing-module.js";
export { buildSolarSchedule, solarCapitalCost, firstYearEnergyMwh } from "./modules/solar/solar-model.js";
export {
  buildConsultingSchedule,
  STAFF_LEVELS,
  staffLevelYear,
  totalOverhead,
  totalHeadcount,
} from "./modules/consulting/consulting-model.js";
export type { StaffLevelYear } from "./modules/consulting/consulting-model.js";
export {
  equityCashFlows,
  equityIrr,
  equityNpv,
  equityMultiple,
  paybackYear,
  summary,
  debtCoverage,
  computeMetrics,
} from "./modules/metrics/metric-reducer.js";
export { runScenarios } from "./modules/scenario/scenario-runner.js";
export type {
  ScenarioFailure,
  ScenarioSuccess,
  ScenarioError,
  ScenarioResult,
  ScenarioSet,
} from "./modules/scenario/scenario-runner.js";

// Engine
export { buildSchedule } from "./engine/build-schedule.js";
export { ProjectionEngine, createSummaryReport, MIN_LENDER_DSCR } from "./engine/projection-engine.js";
export type { ProjectionEngineResult } from "./engine/projection-engine.js";
export { DEFAULT_SOLAR_INPUTS, DEFAULT_CONSULTING_INPUTS, defaultInputs } from "./defaults/default-inputs.js";

// Validation
export { validateInputs, isInputsFor, parseInputs } from "./validate/validate.js";
export type { ValidationResult, ParseResult } from "./validate/validate.js";

// Formatters
export {
  generateAnnualCashFlow,
  formatAnnualCashFlowAsText,
  formatAnnualCashFlowAsJson,
  formatCurrency,
  formatPercent,
  formatNumber,
  formatMultiple,
} from "./formatters/annual-cashflow.js";
export type {
  AnnualCashFlowFormat,
  AnnualCashFlowRow,
  AnnualCashFlowTable,
} from "./formatters/annual-cashflow.js";
