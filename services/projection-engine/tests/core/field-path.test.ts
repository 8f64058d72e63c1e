import { describe, expect, it } from "vitest";

import { InvalidAssumptionError } from "../../src/core/errors.js";
import {
  getAssumption,
  isNumericPath,
  numericLeaves,
  scaleAssumption,
  withAssumption,
} from "../../src/core/field-path.js";
import { DEFAULT_CONSULTING_INPUTS, DEFAULT_SOLAR_INPUTS } from "../../src/defaults/default-inputs.js";

describe("field paths", () => {
  it("reads nested numeric assumptions", () => {
    expect(getAssumption(DEFAULT_SOLAR_INPUTS, "revenue.ppa_price")).toBe(30);
    expect(getAssumption(DEFAULT_CONSULTING_INPUTS, "staffing.analysts.headcount")).toBe(12);
  });

  it("withAssumption returns a new frozen record and leaves the original untouched", () => {
    const next = withAssumption(DEFAULT_SOLAR_INPUTS, "site.degradation", 0.01);

    expect(next.site.degradation).toBe(0.01);
    expect(DEFAULT_SOLAR_INPUTS.site.degradation).toBe(0.005);
    expect(next.site.ac_mw).toBe(100);
    expect(Object.isFrozen(next.site)).toBe(true);
  });

  it("scaleAssumption multiplies the current value", () => {
    const scaled = scaleAssumption(DEFAULT_CONSULTING_INPUTS, "overhead.rent", 1.5);
    expect(scaled.overhead.rent).toBe(450_000);
  });

  it("rejects a non-finite multiplier", () => {
    expect(() => scaleAssumption(DEFAULT_SOLAR_INPUTS, "revenue.ppa_price", Number.NaN)).toThrow(
      InvalidAssumptionError,
    );
  });

  it("rejects paths that do not name a numeric leaf", () => {
    expect(() => getAssumption(DEFAULT_SOLAR_INPUTS, "revenue.spot_price")).toThrow(InvalidAssumptionError);
    expect(() => getAssumption(DEFAULT_SOLAR_INPUTS, "project_name")).toThrow(InvalidAssumptionError);
    expect(() => getAssumption(DEFAULT_SOLAR_INPUTS, "site..ac_mw")).toThrow(InvalidAssumptionError);
  });

  it("lists numeric leaves depth first", () => {
    const leaves = numericLeaves({ a: 1, b: { c: 2, d: "x" }, e: 3 });
    expect(leaves).toEqual([
      ["a", 1],
      ["b.c", 2],
      ["e", 3],
    ]);
  });

  it("isNumericPath accepts only numeric leaves of the record", () => {
    expect(isNumericPath(DEFAULT_SOLAR_INPUTS, "financing.debt_tenor_years")).toBe(true);
    expect(isNumericPath(DEFAULT_SOLAR_INPUTS, "financing")).toBe(false);
    expect(isNumericPath(DEFAULT_SOLAR_INPUTS, "staffing.analysts.utilization")).toBe(false);
  });
});
