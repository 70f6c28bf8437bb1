// Month and longer units use the mean Gregorian year (365.2425 days).
export const TIME_UNIT_SECONDS = {
  NANOSECOND: 1e-9,
  MICROSECOND: 1e-6,
  MILLISECOND: 1e-3,
  SECOND: 1,
  MINUTE: 60,
  HOUR: 3_600,
  DAY: 86_400,
  WEEK: 604_800,
  MONTH: 2_629_746,
  QUARTER: 7_889_238,
  YEAR: 31_556_952,
  DECADE: 315_569_520,
  CENTURY: 3_155_695_200,
} as const;
