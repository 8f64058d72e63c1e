import { NoConvergenceError } from "./errors.js";

// Solver range: -99% to +1000%
export const IRR_MIN_RATE = -0.99;
export const IRR_MAX_RATE = 10;

function assertFiniteNumber(value: number, name: string): void {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new TypeError(`${name} must be a finite number`);
  }
}

function assertFiniteSeries(cashflows: readonly number[]): void {
  if (!Array.isArray(cashflows) || cashflows.length < 2) {
    throw new TypeError("cashflows must be an array with at least 2 entries");
  }
  for (let i = 0; i < cashflows.length; i += 1) {
    const value = cashflows[i];
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new TypeError(`cashflows[${i}] must be a finite number`);
    }
  }
}

function assertRate(rate: number, name: string): void {
  assertFiniteNumber(rate, name);
  if (rate <= -1) {
    throw new RangeError(`${name} must be greater than -1`);
  }
}

function sign(value: number): -1 | 0 | 1 {
  if (Number.isNaN(value)) {
    throw new Error("Computation produced NaN");
  }
  if (value === 0) {
    return 0;
  }
  return value > 0 ? 1 : -1;
}

export function hasSignChange(cashflows: readonly number[]): boolean {
  let hasPositive = false;
  let hasNegative = false;
  for (const value of cashflows) {
    if (value > 0) {
      hasPositive = true;
    }
    if (value < 0) {
      hasNegative = true;
    }
  }
  return hasPositive && hasNegative;
}

function solveRate(
  cashflows: readonly number[],
  f: (rate: number) => number,
  fPrime: (rate: number) => number,
  guess: number,
): number {
  // NPV tolerance scales with the series so the root does not move when every flow is scaled
  const magnitude = cashflows.reduce((max, cf) => Math.max(max, Math.abs(cf)), 0);
  const tolerance = 1e-12 * Math.max(1, magnitude);
  const rateTolerance = 1e-13;
  const maxNewtonIterations = 50;
  const maxBisectionIterations = 200;

  // Newton-Raphson
  let rate = Math.min(Math.max(guess, IRR_MIN_RATE), IRR_MAX_RATE);
  for (let i = 0; i < maxNewtonIterations; i += 1) {
    const value = f(rate);
    if (Math.abs(value) < tolerance) {
      return rate;
    }

    const derivative = fPrime(rate);
    if (!Number.isFinite(derivative) || derivative === 0) {
      break;
    }

    const next = rate - value / derivative;
    if (!Number.isFinite(next) || next <= IRR_MIN_RATE || next >= IRR_MAX_RATE) {
      break;
    }

    if (Math.abs(next - rate) < rateTolerance) {
      return next;
    }
    rate = next;
  }

  // Bisection over the full solver range
  let low = IRR_MIN_RATE;
  let high = IRR_MAX_RATE;

  const fLow = f(low);
  if (fLow === 0) {
    return low;
  }
  const fHigh = f(high);
  if (fHigh === 0) {
    return high;
  }

  const sLow = sign(fLow);
  if (sLow === sign(fHigh)) {
    throw new NoConvergenceError(
      cashflows,
      `no root between ${IRR_MIN_RATE * 100}% and ${IRR_MAX_RATE * 100}%`,
    );
  }

  for (let i = 0; i < maxBisectionIterations; i += 1) {
    const mid = (low + high) / 2;
    const fMid = f(mid);
    if (Math.abs(fMid) < tolerance || high - low < rateTolerance) {
      return mid;
    }

    if (sign(fMid) === sLow) {
      low = mid;
    } else {
      high = mid;
    }
  }

  return (low + high) / 2;
}

// Level payment per period (Excel PMT sign convention: a loan received as +pv pays back negative)
export function pmt(rate: number, nper: number, pv: number, fv = 0): number {
  assertFiniteNumber(rate, "rate");
  assertFiniteNumber(pv, "pv");
  assertFiniteNumber(fv, "fv");

  if (!Number.isInteger(nper) || nper <= 0) {
    throw new RangeError("nper must be a positive integer");
  }
  if (rate <= -1) {
    throw new RangeError("rate must be greater than -1");
  }

  const pow = Math.pow(1 + rate, nper);
  // Rates too small to move 1 + rate amortize as if free
  if (rate === 0 || pow === 1) {
    return -(pv + fv) / nper;
  }

  return -(rate * (fv + pv * pow)) / (pow - 1);
}

// Net present value; cashflows[0] is undiscounted
export function npv(rate: number, cashflows: readonly number[]): number {
  assertRate(rate, "rate");
  if (!Array.isArray(cashflows)) {
    throw new TypeError("cashflows must be an array");
  }
  for (let i = 0; i < cashflows.length; i += 1) {
    const value = cashflows[i];
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new TypeError(`cashflows[${i}] must be a finite number`);
    }
  }

  const r1 = 1 + rate;
  let discount = 1;
  let total = 0;
  for (let t = 0; t < cashflows.length; t += 1) {
    if (t > 0) {
      discount *= r1;
    }
    total += (cashflows[t] ?? 0) / discount;
  }
  return total;
}

/**
 * Internal rate of return for annual cash flows.
 *
 * Newton-Raphson from `guess`, falling back to bisection over
 * [IRR_MIN_RATE, IRR_MAX_RATE]. Throws NoConvergenceError when the series
 * never changes sign or the NPV has the same sign at both ends of the range.
 */
export function irr(cashflows: readonly number[], guess = 0.1): number {
  assertFiniteSeries(cashflows);
  assertFiniteNumber(guess, "guess");

  if (!hasSignChange(cashflows)) {
    throw new NoConvergenceError(
      cashflows,
      "cash flows must include at least one positive and one negative value",
    );
  }

  const f = (rate: number) => npv(rate, cashflows);
  const fPrime = (rate: number) => {
    assertRate(rate, "rate");

    const r1 = 1 + rate;
    let denom = r1 * r1; // (1+r)^(t+1) when t=1
    let total = 0;
    for (let t = 1; t < cashflows.length; t += 1) {
      const cf = cashflows[t] ?? 0;
      total += (-t * cf) / denom;
      denom *= r1;
    }
    return total;
  };

  return solveRate(cashflows, f, fPrime, guess);
}

export function compoundFactor(rate: number, periods: number): number {
  return Math.pow(1 + rate, periods);
}
