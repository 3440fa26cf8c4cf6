/**
 * Ranking of evaluated strategies: net benefit descending, then label in
 * code-unit order, then key. Ranks are 1..N with no gaps.
 */

import type { StrategyBreakdown, StrategyKind, StrategyResult } from "@/lib/types/zod";
import { strategyParameters } from "@/lib/model/catalog";

export interface RankingRow {
  rank: number;
  strategyType: StrategyKind;
  strategyLabel: string;
  key: string;
  netBenefit: number;
  parameters: Record<string, number>;
  breakdown: Readonly<StrategyBreakdown>;
}

export type RankingTable = readonly RankingRow[];

function compareCodeUnits(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function compareResults(a: StrategyResult, b: StrategyResult): number {
  if (a.netBenefit !== b.netBenefit) return b.netBenefit - a.netBenefit;
  return compareCodeUnits(a.label, b.label) || compareCodeUnits(a.key, b.key);
}

export function rankStrategies(results: Iterable<StrategyResult>): RankingTable {
  // Array.prototype.sort is stable.
  return [...results].sort(compareResults).map((result, index) => ({
    rank: index + 1,
    strategyType: result.descriptor.kind,
    strategyLabel: result.label,
    key: result.key,
    netBenefit: result.netBenefit,
    parameters: strategyParameters(result.descriptor),
    breakdown: result.breakdown,
  }));
}
