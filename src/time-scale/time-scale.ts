import { err, ok, type Result } from "neverthrow";
import type { Seconds } from "../shared/types";
import { seconds } from "../utils/seconds";
import { totalDuration } from "../time-unit/time-unit";
import type { TimeUnit } from "../time-unit/types";

export enum TimeScaleErrors {
  INVALID_UNIT_LENGTH = "INVALID_UNIT_LENGTH",
  DEGENERATE_TIME_SCALE = "DEGENERATE_TIME_SCALE",
}

/**
 * A time unit together with an integer unit length, e.g. 2 weeks or 6 months.
 * Instances are frozen and compared by value through {@link TimeScale.equals}.
 */
export class TimeScale {
  private readonly unit: TimeUnit;
  private readonly length: number;

  /**
   * Stores both values as given. Use {@link TimeScale.of} when the unit
   * length comes from outside and has to be checked.
   */
  constructor(timeUnit: TimeUnit, unitLength: number) {
    this.unit = timeUnit;
    this.length = unitLength;
    Object.freeze(this);
  }

  static of(
    timeUnit: TimeUnit,
    unitLength: number
  ): Result<TimeScale, TimeScaleErrors> {
    if (!Number.isSafeInteger(unitLength) || unitLength < 1) {
      return err(TimeScaleErrors.INVALID_UNIT_LENGTH);
    }

    return ok(new TimeScale(timeUnit, unitLength));
  }

  static oneYear(): TimeScale {
    return new TimeScale("YEAR", 1);
  }

  get timeUnit(): TimeUnit {
    return this.unit;
  }

  get unitLength(): number {
    return this.length;
  }

  /**
   * Total amount of time in this scale, in seconds.
   */
  public totalDuration(): Seconds {
    return seconds(totalDuration(this.unit) * this.length);
  }

  /**
   * How many times this scale occurs in `otherTimeScale`. A month per year
   * gives 12. The result is not rounded, and a zero-length scale yields
   * `Infinity` or `NaN`.
   */
  public frequencyPer(otherTimeScale: TimeScale): number {
    return otherTimeScale.totalDuration() / this.totalDuration();
  }

  public safeFrequencyPer(
    otherTimeScale: TimeScale
  ): Result<number, TimeScaleErrors> {
    const frequency = this.frequencyPer(otherTimeScale);

    if (
      !Number.isFinite(this.totalDuration()) ||
      !Number.isFinite(frequency)
    ) {
      return err(TimeScaleErrors.DEGENERATE_TIME_SCALE);
    }

    return ok(frequency);
  }

  public equals(other: TimeScale): boolean {
    return this.unit === other.unit && this.length === other.length;
  }
}
