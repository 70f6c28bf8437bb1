import { describe, expect, test } from "vitest";
import { TIME_UNIT_SECONDS } from "../time-unit/const";
import { isTimeUnit, TIME_UNITS, totalDuration } from "../time-unit/time-unit";

describe("Time units", () => {
  describe("totalDuration", () => {
    test("should return fractional seconds for sub-second units", () => {
      expect(totalDuration("NANOSECOND")).toBe(1e-9);
      expect(totalDuration("MICROSECOND")).toBe(1e-6);
      expect(totalDuration("MILLISECOND")).toBe(0.001);
    });

    test("should return whole seconds for clock units", () => {
      expect(totalDuration("SECOND")).toBe(1);
      expect(totalDuration("MINUTE")).toBe(60);
      expect(totalDuration("HOUR")).toBe(3600);
      expect(totalDuration("DAY")).toBe(86400);
      expect(totalDuration("WEEK")).toBe(7 * 86400);
    });

    test("should derive calendar units from the mean Gregorian year", () => {
      const year = (146_097 * 86_400) / 400;
      expect(totalDuration("YEAR")).toBe(year);
      expect(totalDuration("MONTH")).toBe(year / 12);
      expect(totalDuration("QUARTER")).toBe(year / 4);
      expect(totalDuration("DECADE")).toBe(year * 10);
      expect(totalDuration("CENTURY")).toBe(year * 100);
    });
  });

  describe("TIME_UNITS", () => {
    test("should list every unit exactly once", () => {
      expect([...TIME_UNITS].sort()).toEqual(
        Object.keys(TIME_UNIT_SECONDS).sort()
      );
    });

    test("should be ordered from smallest to largest", () => {
      const durations = TIME_UNITS.map((unit) => totalDuration(unit));
      const sorted = [...durations].sort((a, b) => a - b);
      expect(durations).toEqual(sorted);
    });
  });

  describe("isTimeUnit", () => {
    test("should accept known unit names", () => {
      expect(isTimeUnit("YEAR")).toBe(true);
      expect(isTimeUnit("NANOSECOND")).toBe(true);
    });

    test("should reject unknown names and inherited properties", () => {
      expect(isTimeUnit("FORTNIGHT")).toBe(false);
      expect(isTimeUnit("year")).toBe(false);
      expect(isTimeUnit("toString")).toBe(false);
    });
  });
});
