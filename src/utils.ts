import Decimal from "decimal.js";
import { DateTime } from "luxon";
import { ISODateString } from "./types";

/**
 * Configure Decimal once for every module that formats or rounds amounts.
 * - precision well above the 13-digit nominals found in operation memos
 * - rounding uses ROUND_HALF_EVEN (bankers rounding)
 */
Decimal.set({
  precision: 40,
  rounding: Decimal.ROUND_HALF_EVEN,
  toExpNeg: -20,
  toExpPos: 50,
});

/** Year basis for every day-count fraction in this engine (Actual/365 Fixed). */
export const DAYS_PER_YEAR = 365;

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

export class DayCountCalculator {

  /**
   * Parse a `YYYY-MM-DD` calendar date into a UTC DateTime.
   * Returns null for other ISO shapes (week dates, bare years, timestamps) and impossible days.
   */
  static toDateTime(date: ISODateString): DateTime | null {
    if (!CALENDAR_DATE.test(date)) return null;
    const parsed = DateTime.fromISO(date, { zone: "utc" });
    return parsed.isValid ? parsed.startOf("day") : null;
  }

  static toISODate(date: DateTime): ISODateString {
    return date.toFormat("yyyy-MM-dd");
  }

  /**
   * Builds a UTC date from its parts, or null when the combination does not exist (31 April, 29 Feb 2025).
   */
  static fromParts(year: number, month: number, day: number): DateTime | null {
    const date = DateTime.fromObject({ year, month, day }, { zone: "utc" });
    return date.isValid ? date : null;
  }

  /**
   * Signed whole calendar days from start to end.
   */
  static days(start: DateTime, end: DateTime): number {
    return Math.round(end.diff(start, "days").days);
  }

  /**
   * Actual/365 Fixed year fraction between two dates. Zero when end is not after start.
   */
  static yearFraction(start: DateTime, end: DateTime): number {
    if (!start.isValid || !end.isValid || end <= start) {
      return 0;
    }
    return this.days(start, end) / DAYS_PER_YEAR;
  }

  /** Days left until 31 December of the date's own year. */
  static daysToYearEnd(date: DateTime): number {
    const yearEnd = date.set({ month: 12, day: 31 });
    return this.days(date, yearEnd);
  }
}
