import { loadConfig } from "./config";
import { ExchangeError } from "./errors";
import { ISODateString } from "./types";
import { DayCountCalculator } from "./utils";

/**
 * Index value (UVR) in effect on a date.
 */
export interface IndexSeries {
  lookup(date: ISODateString): number;
}

/**
 * Observed annual inflation for a year, as a fraction.
 */
export interface InflationTable {
  lookup(year: number): number;
}

/**
 * Market inputs an operation needs beyond its own records.
 */
export interface ReferenceData {
  indexSeries: IndexSeries;
  inflationTable: InflationTable;
}

/**
 * In-memory index series keyed by calendar date.
 * Dates without an entry resolve to the default value, which is read from
 * `EXCHANGE_DEFAULT_INDEX_VALUE` when not given.
 */
export class StaticIndexSeries implements IndexSeries {
  private readonly values = new Map<ISODateString, number>();

  constructor(
    entries: Record<ISODateString, number> = {},
    private readonly defaultValue: number = loadConfig().defaultIndexValue
  ) {
    for (const [date, value] of Object.entries(entries)) {
      const day = DayCountCalculator.toDateTime(date);
      if (!day) {
        throw new ExchangeError("INVALID_REFERENCE_DATA", `Invalid index date: ${date}`, { date });
      }
      if (!Number.isFinite(value) || value <= 0) {
        throw new ExchangeError("INVALID_REFERENCE_DATA", `Invalid index value for ${date}: ${value}`, {
          date,
          value,
        });
      }
      this.values.set(DayCountCalculator.toISODate(day), value);
    }
  }

  lookup(date: ISODateString): number {
    const day = DayCountCalculator.toDateTime(date);
    if (!day) return this.defaultValue;
    return this.values.get(DayCountCalculator.toISODate(day)) ?? this.defaultValue;
  }
}

/**
 * In-memory inflation table keyed by year. The default rate comes from
 * `EXCHANGE_DEFAULT_INFLATION` when not given.
 */
export class StaticInflationTable implements InflationTable {
  private readonly rates = new Map<number, number>();

  constructor(
    entries: Record<number, number> = {},
    private readonly defaultRate: number = loadConfig().defaultInflationRate
  ) {
    for (const [key, rate] of Object.entries(entries)) {
      const year = Number(key);
      if (!Number.isInteger(year) || !Number.isFinite(rate) || rate <= -1) {
        throw new ExchangeError("INVALID_REFERENCE_DATA", `Invalid inflation entry ${key}: ${rate}`, {
          year: key,
          rate,
        });
      }
      this.rates.set(year, rate);
    }
  }

  lookup(year: number): number {
    return this.rates.get(year) ?? this.defaultRate;
  }
}
