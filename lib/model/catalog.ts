/**
 * Strategy catalog: the finite parameter space of withdrawal strategies,
 * enumerated lazily. Order: partial (interval × ratio), full-withdrawal
 * years, switch (year × fee rate).
 */

import type {
  StrategyDescriptor,
  StrategyKind,
  StrategyRanges,
  StrategyRangesInput,
} from "@/lib/types/zod";
import { StrategyRangesSchema } from "@/lib/types/zod";
import { InvalidInputError, parseInput } from "@/lib/model/errors";
import type { InputIssue } from "@/lib/model/errors";
import { formatPercent } from "@/lib/utils/format";

export interface StrategyCatalog extends Iterable<StrategyDescriptor> {
  readonly periodYears: number;
  /** Ranges after de-duplication and removal of degenerate entries. */
  readonly ranges: CatalogRanges;
  /** Number of descriptors the catalog yields. */
  readonly count: number;
}

/** Display label, e.g. "Partial withdrawal (every 2y, 50%)". */
export function strategyLabel(descriptor: StrategyDescriptor): string {
  switch (descriptor.kind) {
    case "PARTIAL_WITHDRAWAL":
      return `Partial withdrawal (every ${descriptor.interval}y, ${formatPercent(descriptor.ratio)})`;
    case "FULL_WITHDRAWAL":
      return `Full withdrawal (year ${descriptor.year})`;
    case "SWITCH":
      return `Switch (year ${descriptor.year}, fee ${formatPercent(descriptor.feeRate)})`;
  }
}

/** Stable identity of a descriptor, e.g. "partial:2:0.5". */
export function strategyKey(descriptor: StrategyDescriptor): string {
  switch (descriptor.kind) {
    case "PARTIAL_WITHDRAWAL":
      return `partial:${descriptor.interval}:${descriptor.ratio}`;
    case "FULL_WITHDRAWAL":
      return `full:${descriptor.year}`;
    case "SWITCH":
      return `switch:${descriptor.year}:${descriptor.feeRate}`;
  }
}

export function strategyParameters(descriptor: StrategyDescriptor): Record<string, number> {
  switch (descriptor.kind) {
    case "PARTIAL_WITHDRAWAL":
      return { interval: descriptor.interval, ratio: descriptor.ratio };
    case "FULL_WITHDRAWAL":
      return { year: descriptor.year };
    case "SWITCH":
      return { year: descriptor.year, feeRate: descriptor.feeRate };
  }
}

export const STRATEGY_KIND_LABELS: Record<StrategyKind, string> = {
  PARTIAL_WITHDRAWAL: "Partial withdrawal",
  FULL_WITHDRAWAL: "Full withdrawal",
  SWITCH: "Switch",
};

/** Catalog ranges are frozen; callers can read but never reshape them. */
export type CatalogRanges = {
  readonly [K in keyof StrategyRanges]: readonly number[];
};

function unique(values: readonly number[]): readonly number[] {
  return Object.freeze([...new Set(values)]);
}

function buildCatalog(ranges: StrategyRanges, periodYears: number): StrategyCatalog {
  const r: CatalogRanges = Object.freeze({
    // An interval or switch year at or past the horizon never fires.
    withdrawalIntervals: unique(ranges.withdrawalIntervals.filter((i) => i < periodYears)),
    withdrawalRatios: unique(ranges.withdrawalRatios),
    fullWithdrawalYears: unique(ranges.fullWithdrawalYears),
    switchYears: unique(ranges.switchYears.filter((y) => y < periodYears)),
    switchFeeRates: unique(ranges.switchFeeRates),
  });

  return {
    periodYears,
    ranges: r,
    count:
      r.withdrawalIntervals.length * r.withdrawalRatios.length +
      r.fullWithdrawalYears.length +
      r.switchYears.length * r.switchFeeRates.length,
    *[Symbol.iterator](): Iterator<StrategyDescriptor> {
      for (const interval of r.withdrawalIntervals) {
        for (const ratio of r.withdrawalRatios) {
          yield { kind: "PARTIAL_WITHDRAWAL", interval, ratio };
        }
      }
      for (const year of r.fullWithdrawalYears) {
        yield { kind: "FULL_WITHDRAWAL", year };
      }
      for (const year of r.switchYears) {
        for (const feeRate of r.switchFeeRates) {
          yield { kind: "SWITCH", year, feeRate };
        }
      }
    },
  };
}

/**
 * Validate the ranges and return a re-iterable catalog over them.
 * Throws InvalidInputError on the first call, never while iterating.
 */
export function createStrategyCatalog(
  ranges: StrategyRangesInput,
  periodYears: number
): StrategyCatalog {
  if (!Number.isInteger(periodYears) || periodYears < 1) {
    throw new InvalidInputError([
      { code: "INVALID_PERIOD", message: `Period must be a whole number of years (got ${periodYears})` },
    ]);
  }
  const parsed = parseInput(StrategyRangesSchema, ranges, "RANGES");

  const issues: InputIssue[] = parsed.fullWithdrawalYears
    .filter((year) => year > periodYears)
    .map((year) => ({
      code: "WITHDRAWAL_YEAR_BEYOND_PERIOD",
      message: `Full withdrawal year ${year} is beyond the ${periodYears}-year period`,
      path: "fullWithdrawalYears",
    }));
  if (issues.length > 0) throw new InvalidInputError(issues);

  return buildCatalog(parsed, periodYears);
}
