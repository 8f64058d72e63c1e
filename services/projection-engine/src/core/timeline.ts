import { DateTime } from "luxon";

import { InvalidAssumptionError } from "./errors.js";

export interface TimelineConfig {
  startDate: string; // financial close, ISO date (e.g. '2026-01-01')
  horizonYears: number; // operating years after close
}

/**
 * Annual timeline anchored at financial close. Year 0 is the close itself;
 * operating year `y` ends `y` years later.
 */
export class Timeline {
  readonly startDate: DateTime;
  readonly horizonYears: number;
  readonly years: number[];

  constructor(config: TimelineConfig) {
    if (!Number.isInteger(config.horizonYears) || config.horizonYears <= 0) {
      throw new RangeError("horizonYears must be a positive integer");
    }

    const startDate = DateTime.fromISO(config.startDate, { zone: "utc" }).startOf("day");
    if (!startDate.isValid) {
      throw new RangeError(`Invalid startDate: ${config.startDate}`);
    }

    this.startDate = startDate;
    this.horizonYears = config.horizonYears;
    this.years = Array.from({ length: config.horizonYears }, (_, i) => i + 1);
  }

  // Last day of operating year `year`; year 0 is the close date
  yearEnding(year: number): string {
    if (!Number.isInteger(year) || year < 0 || year > this.horizonYears) {
      throw new RangeError(`year must be an integer between 0 and ${this.horizonYears}`);
    }
    if (year === 0) {
      return this.startDate.toISODate() ?? "";
    }
    return this.startDate.plus({ years: year }).minus({ days: 1 }).toISODate() ?? "";
  }

  yearLabels(): string[] {
    return [0, ...this.years].map((y) => `Year ${y}`);
  }
}

// Forecast rows carry period-ending dates only when a close date is given
export function timelineFor(financialCloseDate: string | undefined, horizonYears: number): Timeline | null {
  if (financialCloseDate === undefined) {
    return null;
  }
  if (!DateTime.fromISO(financialCloseDate, { zone: "utc" }).isValid) {
    throw new InvalidAssumptionError("financial_close_date", `"${financialCloseDate}" is not an ISO date`);
  }
  return new Timeline({ startDate: financialCloseDate, horizonYears });
}
