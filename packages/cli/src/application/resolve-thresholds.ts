import type { Thresholds } from "@git-red/core";
import { InvalidArgumentError } from "commander";

export const DEFAULT_LOOKBACK_DAYS = 30;

export const DEFAULT_MIN_LINES = 10;

export const DEFAULT_MIN_PERCENT = 95;

export type ThresholdOverrides = {
  since?: string | undefined;
  minLines?: number | undefined;
  minPercent?: number | undefined;
};

const pad2 = (value: number): string => String(value).padStart(2, "0");

export const formatCalendarDate = (date: Date): string =>
  `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;

// Calendar arithmetic in local time, so DST shifts never move the date.
export const resolveDefaultSinceDate = (now: Date): string =>
  formatCalendarDate(new Date(now.getFullYear(), now.getMonth(), now.getDate() - DEFAULT_LOOKBACK_DAYS));

export const resolveThresholds = (overrides: ThresholdOverrides, now: Date): Thresholds => ({
  sinceDate: overrides.since ?? resolveDefaultSinceDate(now),
  minLines: overrides.minLines ?? DEFAULT_MIN_LINES,
  minPercent: overrides.minPercent ?? DEFAULT_MIN_PERCENT,
});

export const parseIntegerArgument = (value: string): number => {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }

  return Number.parseInt(trimmed, 10);
};
