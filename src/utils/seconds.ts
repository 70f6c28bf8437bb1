import type { BrandedNumber, Seconds } from "../shared/types";

export function brand<T>(value: number): BrandedNumber<T> {
  return value as BrandedNumber<T>;
}

export function seconds(value: number): Seconds {
  return brand<"seconds">(value);
}
