import { TimeScale } from "../time-scale/time-scale";

export const REPORT_TIME_SCALES: readonly TimeScale[] = [
  new TimeScale("DAY", 1),
  new TimeScale("WEEK", 1),
  new TimeScale("MONTH", 1),
  new TimeScale("QUARTER", 1),
  TimeScale.oneYear(),
];
