import { TimeWindow } from "./shared/types";

const SECONDS_PER_DAY = 24 * 60 * 60;

const toUnixSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

// Date.UTC maps years 0-99 to 1900-1999; setUTCFullYear does not
const startOfYear = (year: number): number => {
  const date = new Date(0);
  date.setUTCFullYear(year, 0, 1);
  return toUnixSeconds(date);
};

/**
 * [Jan 1 <year> 00:00 UTC, Jan 1 <year + 1> 00:00 UTC)
 */
export function yearToWindow(year: number): TimeWindow {
  return {
    after: startOfYear(year),
    before: startOfYear(year + 1),
    year,
  };
}

/**
 * [now - days, now), truncated to whole seconds
 */
export function lastDaysWindow(now: Date = new Date(), days: number = 7): TimeWindow {
  return {
    after: toUnixSeconds(new Date(now.getTime() - days * SECONDS_PER_DAY * 1000)),
    before: toUnixSeconds(now),
  };
}

/**
 * Year 0 counts as no year
 */
export function resolveWindow(year?: number, now: Date = new Date()): TimeWindow {
  return year ? yearToWindow(year) : lastDaysWindow(now);
}

export function windowFileName(window: TimeWindow): string {
  return window.year !== undefined
    ? `activities_${window.year}.csv`
    : "activities_last_7_days.csv";
}
