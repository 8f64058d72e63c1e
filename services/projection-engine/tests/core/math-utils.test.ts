import { describe, expect, it } from "vitest";

import { NoConvergenceError } from "../../src/core/errors.js";
import { compoundFactor, hasSignChange, irr, npv, pmt } from "../../src/core/math-utils.js";

describe("math-utils", () => {
  it("computes PMT (matches known loan payments)", () => {
    expect(pmt(0.08, 10, 100_000)).toBeCloseTo(-14902.948869707536, 8);
    expect(pmt(0.05, 18, 40_279_680)).toBeCloseTo(-3445774.4602478235, 6);
  });

  it("spreads principal evenly at a zero rate", () => {
    expect(pmt(0, 4, 1000)).toBe(-250);
  });

  it("treats a rate too small to compound as zero", () => {
    expect(pmt(1e-17, 5, 500_000)).toBe(-100_000);
  });

  it("rejects a non-integer period count", () => {
    expect(() => pmt(0.05, 2.5, 1000)).toThrow(RangeError);
  });

  it("computes NPV for regular cashflows", () => {
    expect(npv(0.1, [-100, 110])).toBeCloseTo(0, 10);
    expect(npv(0.1, [-100, 60, 60])).toBeCloseTo(4.132231404958669, 10);
    expect(npv(0, [-100, 60, 60])).toBe(20);
  });

  it("computes IRR for regular cashflows", () => {
    expect(irr([-100, 110])).toBeCloseTo(0.1, 10);
    expect(irr([-100, 60, 60])).toBeCloseTo(0.1306623862918075, 10);
  });

  it("finds a negative IRR when the outlay is never recovered", () => {
    expect(irr([-100, 50, 40])).toBeLessThan(0);
    expect(npv(irr([-100, 50, 40]), [-100, 50, 40])).toBeCloseTo(0, 8);
  });

  it("IRR is unchanged when every cash flow is scaled by a positive constant", () => {
    const series = [-26_853_120, 593_225.54, 621_949.24, 650_907.58, 4_000_000, 30_000_000];
    const base = irr(series);
    for (const k of [0.001, 3, 1_000]) {
      expect(irr(series.map((cf) => cf * k))).toBeCloseTo(base, 9);
    }
  });

  it("IRR is positive for a single outlay followed by net inflows", () => {
    expect(irr([-1000, 100, 200, 300, 400, 500])).toBeGreaterThan(0);
  });

  it("throws NoConvergenceError carrying the series when flows never change sign", () => {
    const series = [100, 50, 25];
    let caught: unknown;
    try {
      irr(series);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(NoConvergenceError);
    if (caught instanceof NoConvergenceError) {
      expect(caught.code).toBe("NO_CONVERGENCE");
      expect(caught.series).toEqual([100, 50, 25]);
      expect(Object.isFrozen(caught.series)).toBe(true);
    }
  });

  it("throws NoConvergenceError for an all-zero series", () => {
    expect(() => irr([0, 0, 0])).toThrow(NoConvergenceError);
  });

  it("throws TypeError for malformed input", () => {
    expect(() => irr([-100])).toThrow(TypeError);
    expect(() => irr([-100, Number.NaN])).toThrow(TypeError);
  });

  it("detects sign changes", () => {
    expect(hasSignChange([-1, 0, 2])).toBe(true);
    expect(hasSignChange([0, 1, 2])).toBe(false);
  });

  it("compounds escalators", () => {
    expect(compoundFactor(0.02, 0)).toBe(1);
    expect(compoundFactor(0.1, 2)).toBeCloseTo(1.21, 12);
  });
});
