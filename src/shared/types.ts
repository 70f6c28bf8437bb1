export type BrandedNumber<T> = number & { __brand: T };

export type Seconds = BrandedNumber<"seconds">;
