/**
 * @file rollups.ts
 * @module @workspace/domain/reporting
 * @description Pure aggregation rules behind the back-office dashboard.
 */

import { Option } from "effect";

// =============================================================================
// WEEKDAY BUCKETS
// =============================================================================

export const WEEKDAYS = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"] as const;
export type Weekday = (typeof WEEKDAYS)[number];

export interface WeekdayCount {
  readonly day: Weekday;
  readonly count: number;
}

// Date#getUTCDay() is 0 for Sunday; buckets start on Monday
const weekdayOf = (date: Date): number => (date.getUTCDay() + 6) % 7;

/**
 * Counts timestamps per UTC weekday. Always returns the seven days in
 * Mon..Sun order, with zero for days without entries.
 */
export const bucketByWeekday = (
  timestamps: ReadonlyArray<Date>,
): ReadonlyArray<WeekdayCount> => {
  const counts = WEEKDAYS.map(() => 0);
  for (const timestamp of timestamps) {
    const index = weekdayOf(timestamp);
    counts[index] = (counts[index] ?? 0) + 1;
  }
  return WEEKDAYS.map((day, index) => ({ day, count: counts[index] ?? 0 }));
};

export const TRAILING_WINDOW_DAYS = 7;

export const trailingWindowStart = (now: Date): Date =>
  new Date(now.getTime() - TRAILING_WINDOW_DAYS * 24 * 60 * 60 * 1000);

// =============================================================================
// LOAD FACTOR
// =============================================================================

export interface FlightLoad {
  readonly occupied: number;
  readonly capacity: Option.Option<number>;
}

/** Percentage of capacity in use; None when capacity is missing or not positive. */
export const loadFactor = (load: FlightLoad): Option.Option<number> =>
  load.capacity.pipe(
    Option.filter((capacity) => capacity > 0),
    Option.map((capacity) => (load.occupied / capacity) * 100),
  );

export const roundToTenth = (value: number): number =>
  Math.round(value * 10) / 10;

/**
 * Mean load factor over the flights with a usable capacity, rounded to one
 * decimal. Zero when no flight qualifies.
 */
export const averageLoadFactor = (loads: ReadonlyArray<FlightLoad>): number => {
  const factors = loads.flatMap((load) => Option.toArray(loadFactor(load)));
  if (factors.length === 0) return 0;
  const sum = factors.reduce((acc, value) => acc + value, 0);
  return roundToTenth(sum / factors.length);
};

// =============================================================================
// CALENDAR DAYS
// =============================================================================

/** [start, end) of the UTC calendar day containing `date`. */
export const utcDayRange = (date: Date): readonly [Date, Date] => {
  const start = new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()),
  );
  const end = new Date(start.getTime() + 24 * 60 * 60 * 1000);
  return [start, end] as const;
};
