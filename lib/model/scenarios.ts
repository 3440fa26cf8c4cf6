/**
 * Scenario analysis for one strategy: vary request parameters one at a time
 * (sensitivity) or over every combination (grid) and evaluate each variant.
 */

import type { ComparisonRequest, StrategyDescriptor, StrategyResult } from "@/lib/types/zod";
import { LARGE_SEARCH_SPACE_THRESHOLD } from "@/lib/model/constants";
import { getEffectiveComparisonInput } from "@/lib/model/effective-inputs";
import { evaluateStrategy } from "@/lib/model/evaluator";
import { createTaxEngine } from "@/lib/model/tax";

export type ScenarioParameter =
  | "monthlyPremium"
  | "annualGrowthRate"
  | "periodYears"
  | "taxableIncome";

/** Grid axes are combined in this order; the last varies fastest. */
export const SCENARIO_PARAMETERS: readonly ScenarioParameter[] = [
  "monthlyPremium",
  "annualGrowthRate",
  "periodYears",
  "taxableIncome",
];

export type ScenarioValues = Partial<Record<ScenarioParameter, number>>;
export type ScenarioVariations = Partial<Record<ScenarioParameter, readonly number[]>>;

export interface ScenarioRow {
  scenarioId: number;
  /** Only the varied parameters. */
  parameters: ScenarioValues;
  key: string;
  /** Years the premiums were paid: the withdrawal year, or the whole period. */
  yearsHeld: number;
  netBenefit: number;
  taxSavings: number;
  terminalValue: number;
  totalContributions: number;
  annualizedReturn: number | null;
  annualNetBenefit: number;
  /** Net benefit per unit of premium paid. */
  investmentEfficiency: number;
}

function withValue(base: ScenarioValues, parameter: ScenarioParameter, value: number): ScenarioValues {
  const next: ScenarioValues = { ...base };
  next[parameter] = value;
  return next;
}

function applyScenario(request: ComparisonRequest, values: ScenarioValues): ComparisonRequest {
  const { taxableIncome, ...planValues } = values;
  return {
    ...request,
    plan: { ...request.plan, ...planValues },
    tax: taxableIncome === undefined ? request.tax : { ...request.tax, taxableIncome },
  };
}

function yearsHeld(descriptor: StrategyDescriptor, periodYears: number): number {
  return descriptor.kind === "FULL_WITHDRAWAL" ? descriptor.year : periodYears;
}

function toRow(
  scenarioId: number,
  parameters: ScenarioValues,
  result: StrategyResult,
  years: number
): ScenarioRow {
  const { breakdown } = result;
  return {
    scenarioId,
    parameters,
    key: result.key,
    yearsHeld: years,
    netBenefit: result.netBenefit,
    taxSavings: breakdown.taxSavings,
    terminalValue: breakdown.terminalValue,
    totalContributions: breakdown.totalContributions,
    annualizedReturn: breakdown.annualizedReturn,
    annualNetBenefit: years > 0 ? result.netBenefit / years : 0,
    investmentEfficiency:
      breakdown.totalContributions > 0 ? result.netBenefit / breakdown.totalContributions : 0,
  };
}

/** Evaluate `descriptor` under the request with `values` substituted. */
export function runScenario(
  request: ComparisonRequest,
  descriptor: StrategyDescriptor,
  values: ScenarioValues,
  scenarioId = 1
): ScenarioRow {
  const input = getEffectiveComparisonInput(applyScenario(request, values));
  const result = evaluateStrategy(input.plan, createTaxEngine(input.tax), descriptor, {
    reinvestment: input.reinvestment,
    vehicle: input.vehicle,
  });
  return toRow(scenarioId, values, result, yearsHeld(descriptor, input.plan.periodYears));
}

/** One row per value of `parameter`, everything else as in the request. */
export function analyzeSensitivity(
  request: ComparisonRequest,
  descriptor: StrategyDescriptor,
  parameter: ScenarioParameter,
  values: readonly number[]
): ScenarioRow[] {
  return values.map((value, index) =>
    runScenario(request, descriptor, withValue({}, parameter, value), index + 1)
  );
}

/**
 * Every combination of the given variations. No variations yields the
 * request itself as scenario 1; an empty list for any parameter yields none.
 */
export function runScenarioGrid(
  request: ComparisonRequest,
  descriptor: StrategyDescriptor,
  variations: ScenarioVariations
): ScenarioRow[] {
  let combinations: ScenarioValues[] = [{}];
  for (const parameter of SCENARIO_PARAMETERS) {
    const values = variations[parameter];
    if (values === undefined) continue;
    combinations = combinations.flatMap((combination) =>
      values.map((value) => withValue(combination, parameter, value))
    );
  }

  if (combinations.length > LARGE_SEARCH_SPACE_THRESHOLD) {
    console.warn(`[Scenarios] Evaluating ${combinations.length} scenarios`);
  }
  return combinations.map((values, index) => runScenario(request, descriptor, values, index + 1));
}
