import type { TimeUnit } from "../time-unit/types";

export type FrequencyReportRow = {
  timeUnit: TimeUnit;
  unitLength: number;
  frequency: number;
};
