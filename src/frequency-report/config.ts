import "dotenv/config";
import { err, type Result } from "neverthrow";
import { TimeScale, TimeScaleErrors } from "../time-scale/time-scale";
import { isTimeUnit } from "../time-unit/time-unit";

export enum TimeScaleConfigErrors {
  TIME_SCALE_UNKNOWN_UNIT = "TIME_SCALE_UNKNOWN_UNIT",
  TIME_SCALE_LENGTH_NOT_A_NUMBER = "TIME_SCALE_LENGTH_NOT_A_NUMBER",
}

export const DEFAULT_TIME_SCALE_UNIT = "MONTH";
export const DEFAULT_TIME_SCALE_LENGTH = "1";

const DECIMAL_NUMBER = /^[+-]?\d+(\.\d+)?$/;

export function loadTimeScaleConfig(
  env: NodeJS.ProcessEnv = process.env
): Result<TimeScale, TimeScaleConfigErrors | TimeScaleErrors> {
  const unit = (
    env.TIME_SCALE_UNIT?.trim() || DEFAULT_TIME_SCALE_UNIT
  ).toUpperCase();
  const length = (env.TIME_SCALE_LENGTH || DEFAULT_TIME_SCALE_LENGTH).trim();

  if (!isTimeUnit(unit)) {
    return err(TimeScaleConfigErrors.TIME_SCALE_UNKNOWN_UNIT);
  }

  // Decimal digits only; Number() would also take "0x10" or "  ".
  if (!DECIMAL_NUMBER.test(length)) {
    return err(TimeScaleConfigErrors.TIME_SCALE_LENGTH_NOT_A_NUMBER);
  }

  return TimeScale.of(unit, Number(length));
}
