import type { TIME_UNIT_SECONDS } from "./const";

export type TimeUnit = keyof typeof TIME_UNIT_SECONDS;
