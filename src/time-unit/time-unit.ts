import type { Seconds } from "../shared/types";
import { seconds } from "../utils/seconds";
import { TIME_UNIT_SECONDS } from "./const";
import type { TimeUnit } from "./types";

// Smallest to largest.
export const TIME_UNITS: readonly TimeUnit[] = [
  "NANOSECOND",
  "MICROSECOND",
  "MILLISECOND",
  "SECOND",
  "MINUTE",
  "HOUR",
  "DAY",
  "WEEK",
  "MONTH",
  "QUARTER",
  "YEAR",
  "DECADE",
  "CENTURY",
];

export function isTimeUnit(value: string): value is TimeUnit {
  return Object.prototype.hasOwnProperty.call(TIME_UNIT_SECONDS, value);
}

/**
 * Nominal duration of a single unit, in seconds.
 */
export function totalDuration(unit: TimeUnit): Seconds {
  return seconds(TIME_UNIT_SECONDS[unit]);
}
