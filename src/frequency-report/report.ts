import { Result } from "neverthrow";
import type { TimeScale, TimeScaleErrors } from "../time-scale/time-scale";
import { REPORT_TIME_SCALES } from "./const";
import type { FrequencyReportRow } from "./types";

export function buildFrequencyReport(
  scale: TimeScale,
  targets: readonly TimeScale[] = REPORT_TIME_SCALES
): Result<FrequencyReportRow[], TimeScaleErrors> {
  return Result.combine(
    targets.map((target) =>
      scale.safeFrequencyPer(target).map((frequency) => ({
        timeUnit: target.timeUnit,
        unitLength: target.unitLength,
        frequency,
      }))
    )
  );
}
