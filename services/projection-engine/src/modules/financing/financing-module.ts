import { InvalidAssumptionError } from "../../core/errors.js";
import { requireFinite, requireNonNegative, requireRate } from "../../core/guards.js";
import { pmt } from "../../core/math-utils.js";
import type { AmortizationRow, FinancingStructure } from "../../types/schedule.js";

export interface DebtTerms {
  principal: number;
  equity: number;
  interestRate: number;
  tenorYears: number;
  horizonYears: number;
  // Input paths reported on InvalidAssumptionError
  fields: {
    principal: string;
    equity: string;
    interestRate: string;
    tenorYears: string;
  };
}

function assertDebtTerms(terms: DebtTerms): void {
  requireNonNegative(terms.principal, terms.fields.principal);
  requireFinite(terms.equity, terms.fields.equity);

  if (terms.principal === 0) {
    return;
  }

  requireRate(terms.interestRate, terms.fields.interestRate);
  if (!Number.isInteger(terms.tenorYears) || terms.tenorYears <= 0) {
    throw new InvalidAssumptionError(
      terms.fields.tenorYears,
      `must be a positive whole number of years when debt is drawn (got ${terms.tenorYears})`,
    );
  }
  if (terms.tenorYears > terms.horizonYears) {
    throw new InvalidAssumptionError(
      terms.fields.tenorYears,
      `${terms.tenorYears}-year tenor outlasts the ${terms.horizonYears}-year forecast`,
    );
  }
}

/**
 * Level-payment (annuity) amortization aligned to forecast years 1..N.
 * Debt service is zero after the tenor; the last tenor year repays whatever
 * balance rounding has left so principal repayments sum to the principal.
 */
export function buildFinancing(terms: DebtTerms): FinancingStructure {
  assertDebtTerms(terms);

  const hasDebt = terms.principal > 0;
  const annualPayment = hasDebt ? -pmt(terms.interestRate, terms.tenorYears, terms.principal) : 0;

  const amortization: AmortizationRow[] = [];
  let balance = terms.principal;

  for (let year = 1; year <= terms.horizonYears; year += 1) {
    const openingBalance = balance;
    let interest = 0;
    let principal = 0;

    if (hasDebt && year <= terms.tenorYears) {
      interest = openingBalance * terms.interestRate;
      principal = year === terms.tenorYears ? openingBalance : annualPayment - interest;
      balance = openingBalance - principal;
    }

    amortization.push(
      Object.freeze({
        year,
        openingBalance,
        interest,
        principal,
        debtService: interest + principal,
        closingBalance: balance,
      }),
    );
  }

  return Object.freeze({
    debtPrincipal: terms.principal,
    equityContribution: terms.equity,
    interestRate: terms.interestRate,
    tenorYears: terms.tenorYears,
    annualPayment,
    amortization: Object.freeze(amortization),
  });
}

export function amortizationAt(financing: FinancingStructure, year: number): AmortizationRow {
  const row = financing.amortization[year - 1];
  if (!row) {
    throw new RangeError(`year must be between 1 and ${financing.amortization.length}`);
  }
  return row;
}
