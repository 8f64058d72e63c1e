import { describe, expect, it } from "vitest";

import { InvalidAssumptionError, NoConvergenceError } from "../../src/core/errors.js";
import { withAssumption } from "../../src/core/field-path.js";
import { DEFAULT_CONSULTING_INPUTS, DEFAULT_SOLAR_INPUTS, defaultInputs } from "../../src/defaults/default-inputs.js";
import { ProjectionEngine, createSummaryReport } from "../../src/engine/projection-engine.js";

describe("ProjectionEngine", () => {
  const engine = new ProjectionEngine();

  it("defaultInputs returns the canonical record per sector", () => {
    expect(defaultInputs("solar")).toBe(DEFAULT_SOLAR_INPUTS);
    expect(defaultInputs("consulting")).toBe(DEFAULT_CONSULTING_INPUTS);
    expect(Object.isFrozen(DEFAULT_SOLAR_INPUTS.capex)).toBe(true);
  });

  it("runs the default solar project and flags weak returns", () => {
    const result = engine.run(DEFAULT_SOLAR_INPUTS);

    expect(result.success).toBe(true);
    expect(result.projection?.schedule.rows).toHaveLength(25);
    expect(result.metrics?.paybackYear).toBe(25);
    expect(result.warnings).toEqual([
      "Tax floored to zero in 6 loss year(s); losses are not carried forward",
      "Equity IRR of 0.34% is below the 12.00% target",
      "Minimum DSCR of 1.17x is below typical lender requirements (1.20x)",
    ]);
  });

  it("runs the default consulting firm without warnings", () => {
    const result = engine.run(DEFAULT_CONSULTING_INPUTS);

    expect(result.success).toBe(true);
    expect(result.metrics?.debtCoverage.minDscr).toBeNull();
    expect(result.warnings).toEqual([]);
  });

  it("warns when equity is not returned", () => {
    const inputs = withAssumption(DEFAULT_CONSULTING_INPUTS, "financing.equity_investment", 10_000_000);
    const result = engine.run(inputs);

    expect(result.success).toBe(true);
    expect(result.warnings).toContain("Equity multiple is below 1.0x - investor will lose money");
  });

  it("reports an invalid assumption as a failed result", () => {
    const inputs = withAssumption(DEFAULT_SOLAR_INPUTS, "financing.debt_tenor_years", 0);
    const result = engine.run(inputs);

    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      "Invalid assumption financing.debt_tenor_years: must be a positive whole number of years when debt is drawn (got 0)",
    ]);
    expect(result.error).toBeInstanceOf(InvalidAssumptionError);
    expect(result.projection).toBeUndefined();
  });

  it("reports a return target of -100% against financing.equity_return_target", () => {
    const inputs = withAssumption(DEFAULT_SOLAR_INPUTS, "financing.equity_return_target", -1);
    const result = engine.run(inputs);

    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      "Invalid assumption financing.equity_return_target: must be greater than -100% (got -1)",
    ]);
    expect(result.error instanceof InvalidAssumptionError && result.error.field).toBe(
      "financing.equity_return_target",
    );
  });

  it("reports a non-converging IRR as a failed result", () => {
    const inputs = withAssumption(DEFAULT_SOLAR_INPUTS, "revenue.ppa_price", 0);
    const result = engine.run(inputs);

    expect(result.success).toBe(false);
    expect(result.error).toBeInstanceOf(NoConvergenceError);
    expect(result.errors).toEqual([
      "IRR did not converge: cash flows must include at least one positive and one negative value",
    ]);
  });

  it("runs a validated request", () => {
    const result = engine.runRequest({
      contract: { contract_version: "CONSULTING_V1" },
      inputs: DEFAULT_CONSULTING_INPUTS,
    });

    expect(result.success).toBe(true);
    expect(result.inputs).toEqual(DEFAULT_CONSULTING_INPUTS);
  });

  it("rejects a request that fails schema validation", () => {
    const result = engine.runRequest({
      contract: { contract_version: "CONSULTING_V1" },
      inputs: { ...DEFAULT_CONSULTING_INPUTS, analysis_years: 0 },
    });

    expect(result.success).toBe(false);
    expect(result.errors).toEqual(["/inputs/analysis_years: must be >= 1"]);
  });
});

describe("createSummaryReport", () => {
  const engine = new ProjectionEngine();

  it("summarises a solar run", () => {
    const lines = createSummaryReport(engine.run(DEFAULT_SOLAR_INPUTS)).split("\n");

    expect(lines[0]).toBe("=".repeat(60));
    expect(lines[1]).toBe("PROJECTION SUMMARY: Example 100 MW Solar PV");
    expect(lines).toContain("  Utility-scale solar PV (SOLAR_V1)");
    expect(lines).toContain("  Horizon: 25 years");
    expect(lines).toContain("  Total Capex: $95,904,000");
    expect(lines).toContain("  Debt: $40,279,680");
    expect(lines).toContain("  Interest Rate: 5.00%");
    expect(lines).toContain("  Equity IRR: 0.34%");
    expect(lines).toContain("  Equity Multiple: 1.07x");
    expect(lines).toContain("  Payback Year: 25");
    expect(lines).toContain("  Min DSCR: 1.17x");
    expect(lines).toContain("WARNINGS");
    expect(lines[lines.length - 1]).toBe("=".repeat(60));
  });

  it("summarises a consulting run", () => {
    const lines = createSummaryReport(engine.run(DEFAULT_CONSULTING_INPUTS)).split("\n");

    expect(lines).toContain("  Professional services firm (CONSULTING_V1)");
    expect(lines).toContain("  Revenue per Head: $270,994");
    expect(lines).toContain("  Min DSCR: -");
    expect(lines).not.toContain("WARNINGS");
  });

  it("lists errors for a failed run", () => {
    const inputs = withAssumption(DEFAULT_SOLAR_INPUTS, "site.ac_mw", 0);
    const report = createSummaryReport(engine.run(inputs));

    expect(report).toBe("Projection Failed:\nInvalid assumption site.ac_mw: must be greater than 0 (got 0)");
  });
});
