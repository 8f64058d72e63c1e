import { describe, expect, it } from "vitest";

import { InvalidAssumptionError } from "../../src/core/errors.js";
import { withAssumption } from "../../src/core/field-path.js";
import { DEFAULT_CONSULTING_INPUTS } from "../../src/defaults/default-inputs.js";
import {
  STAFF_LEVELS,
  buildConsultingSchedule,
  staffLevelYear,
  totalHeadcount,
  totalOverhead,
} from "../../src/modules/consulting/consulting-model.js";
import type { ConsultingInputs } from "../../src/types/inputs.js";

function rejectedField(inputs: ConsultingInputs): string | undefined {
  try {
    buildConsultingSchedule(inputs);
  } catch (error) {
    if (error instanceof InvalidAssumptionError) {
      return error.field;
    }
    throw error;
  }
  return undefined;
}

// No overhead, and every hour worked is billed and collected
function leanFirm(): ConsultingInputs {
  let inputs: ConsultingInputs = DEFAULT_CONSULTING_INPUTS;
  for (const item of ["rent", "software", "marketing", "travel", "admin"] as const) {
    inputs = withAssumption(inputs, `overhead.${item}` as const, 0);
  }
  for (const level of STAFF_LEVELS) {
    inputs = withAssumption(inputs, `staffing.${level}.utilization` as const, 1);
    inputs = withAssumption(inputs, `staffing.${level}.realization` as const, 1);
  }
  return inputs;
}

describe("consulting helpers", () => {
  it("bills hours x rate x realization per staff level", () => {
    const partners = staffLevelYear(DEFAULT_CONSULTING_INPUTS.staffing.partners, 2080, 1, 1);

    expect(partners.billableHours).toBeCloseTo(3744, 9);
    expect(partners.revenue).toBeCloseTo(1_179_360, 6);
    expect(partners.salaryCost).toBe(750_000);
  });

  it("totals overhead and headcount", () => {
    expect(totalOverhead(DEFAULT_CONSULTING_INPUTS.overhead)).toBe(1_150_000);
    expect(totalHeadcount(DEFAULT_CONSULTING_INPUTS)).toBe(21);
  });
});

describe("buildConsultingSchedule", () => {
  const { schedule, financing } = buildConsultingSchedule(DEFAULT_CONSULTING_INPUTS);
  const year1 = schedule.rows[0];
  const year2 = schedule.rows[1];

  it("emits one row per analysis year", () => {
    expect(schedule.sector).toBe("consulting");
    expect(schedule.rows).toHaveLength(5);
    expect(schedule.rows[4]?.periodEnding).toBe("2030-12-31");
  });

  it("computes the year-1 income statement", () => {
    expect(year1?.billableHours).toBeCloseTo(32_448, 6);
    expect(year1?.revenue).toBeCloseTo(5_690_880, 4);
    expect(year1?.retainerRevenue).toBeCloseTo(3_414_528, 4);
    expect(year1?.projectRevenue).toBeCloseTo(2_276_352, 4);
    expect(year1?.salaryCost).toBe(2_730_000);
    expect(year1?.overheadCost).toBe(1_150_000);
    expect(year1?.ebitda).toBeCloseTo(1_810_880, 4);
    expect(year1?.tax).toBeCloseTo(470_828.8, 4);
    expect(year1?.netIncome).toBeCloseTo(1_340_051.2, 4);
    expect(year1?.depreciation).toBe(0);
  });

  it("escalates billing rates, salaries and overhead", () => {
    expect(year2?.revenue).toBeCloseTo(5_861_606.4, 4);
    expect(year2?.salaryCost).toBeCloseTo(2_811_900, 4);
    expect(year2?.overheadCost).toBeCloseTo(1_173_000, 4);
  });

  it("charges the build-up of working capital against cash flow", () => {
    expect(year1?.netWorkingCapital).toBeCloseTo(1_009_906.8493150685, 4);
    expect(year1?.workingCapitalChange).toBeCloseTo(1_009_906.8493150685, 4);
    expect(year1?.netCashFlow).toBeCloseTo(330_144.3506849315, 4);
    expect(year2?.workingCapitalChange).toBeCloseTo(30_769.808219177998, 4);
    expect(year2?.netCashFlow).toBeCloseTo(1_357_992.9277808224, 4);
  });

  it("reports revenue per head from year 1", () => {
    expect(schedule.revenuePerHead).toBeCloseTo(270_994.28571428574, 6);
  });

  it("carries no debt by default", () => {
    expect(financing.debtPrincipal).toBe(0);
    expect(financing.equityContribution).toBe(1_000_000);
    expect(schedule.rows.every((r) => r.debtService === 0)).toBe(true);
  });
});

describe("consulting scenarios", () => {
  it("with no overhead and full utilization, net income is EBITDA after tax", () => {
    const { schedule } = buildConsultingSchedule(leanFirm());

    for (const row of schedule.rows) {
      expect(row.overheadCost).toBe(0);
      expect(row.netIncome).toBeCloseTo(row.ebitda * (1 - 0.26), 6);
    }
  });

  it("with no salaries either, net income is revenue after tax", () => {
    let inputs = leanFirm();
    for (const level of STAFF_LEVELS) {
      inputs = withAssumption(inputs, `staffing.${level}.salary` as const, 0);
    }
    const { schedule } = buildConsultingSchedule(inputs);
    const year1 = schedule.rows[0];

    // 2080 h x (3 x 350 + 6 x 250 + 12 x 150)
    expect(year1?.revenue).toBeCloseTo(9_048_000, 4);
    expect(year1?.netIncome).toBeCloseTo(6_695_520, 4);
  });

  it("floors tax at zero when the firm runs a loss", () => {
    const inputs = withAssumption(DEFAULT_CONSULTING_INPUTS, "overhead.rent", 5_000_000);
    const year1 = buildConsultingSchedule(inputs).schedule.rows[0];

    expect(year1?.taxableIncome).toBeLessThan(0);
    expect(year1?.tax).toBe(0);
    expect(year1?.netIncome).toBe(year1?.taxableIncome);
  });

  it("services term debt from cash flow", () => {
    let inputs = withAssumption(DEFAULT_CONSULTING_INPUTS, "financing.debt_amount", 500_000);
    inputs = withAssumption(inputs, "financing.debt_interest_rate", 0.08);
    inputs = withAssumption(inputs, "financing.debt_tenor_years", 5);
    const { schedule, financing } = buildConsultingSchedule(inputs);
    const year1 = schedule.rows[0];

    expect(year1?.interest).toBeCloseTo(40_000, 6);
    expect(year1?.taxableIncome).toBeCloseTo((year1?.ebitda ?? 0) - 40_000, 6);
    expect(schedule.rows.reduce((sum, r) => sum + r.principal, 0)).toBeCloseTo(500_000, 6);
    expect(year1?.netCashFlow).toBeCloseTo(
      (year1?.netIncome ?? 0) - (year1?.principal ?? 0) - (year1?.workingCapitalChange ?? 0),
      6,
    );
    expect(financing.amortization[4]?.closingBalance).toBe(0);
  });

  it("amortizes a loan at a vanishingly small rate straight-line", () => {
    let inputs = withAssumption(DEFAULT_CONSULTING_INPUTS, "financing.debt_amount", 500_000);
    inputs = withAssumption(inputs, "financing.debt_interest_rate", 1e-17);
    inputs = withAssumption(inputs, "financing.debt_tenor_years", 5);
    const { schedule, financing } = buildConsultingSchedule(inputs);

    expect(financing.annualPayment).toBe(100_000);
    expect(schedule.rows[0]?.principal).toBeCloseTo(100_000, 6);
    expect(schedule.rows.reduce((sum, r) => sum + r.principal, 0)).toBeCloseTo(500_000, 6);
  });
});

describe("consulting assumption errors", () => {
  it("a firm with no staff names staffing.headcount", () => {
    let inputs: ConsultingInputs = DEFAULT_CONSULTING_INPUTS;
    for (const level of STAFF_LEVELS) {
      inputs = withAssumption(inputs, `staffing.${level}.headcount` as const, 0);
    }
    expect(rejectedField(inputs)).toBe("staffing.headcount");
  });

  it("debt without a tenor names financing.debt_tenor_years", () => {
    const inputs = withAssumption(DEFAULT_CONSULTING_INPUTS, "financing.debt_amount", 250_000);
    expect(rejectedField(inputs)).toBe("financing.debt_tenor_years");
  });

  it("a zero analysis horizon names analysis_years", () => {
    const inputs = withAssumption(DEFAULT_CONSULTING_INPUTS, "analysis_years", 0);
    expect(rejectedField(inputs)).toBe("analysis_years");
  });

  it("zero standard hours names staffing.standard_annual_hours", () => {
    const inputs = withAssumption(DEFAULT_CONSULTING_INPUTS, "staffing.standard_annual_hours", 0);
    expect(rejectedField(inputs)).toBe("staffing.standard_annual_hours");
  });

  it("a negative headcount names its level", () => {
    const inputs = withAssumption(DEFAULT_CONSULTING_INPUTS, "staffing.managers.headcount", -1);
    expect(rejectedField(inputs)).toBe("staffing.managers.headcount");
  });
});
