/**
 * Comparison run: catalog → one evaluation per descriptor → ranking.
 * One TaxEngine is built per run; evaluations share only read-only inputs.
 */

import type {
  AlternativeVehicleInput,
  ComparisonInput,
  ComparisonRequest,
  PremiumPlanInput,
  StrategyDescriptor,
  StrategyResult,
} from "@/lib/types/zod";
import { AlternativeVehicleSchema } from "@/lib/types/zod";
import { createStrategyCatalog } from "@/lib/model/catalog";
import { getEffectiveComparisonInput } from "@/lib/model/effective-inputs";
import { InvalidInputError, invalidInput, parseInput } from "@/lib/model/errors";
import { evaluateStrategy } from "@/lib/model/evaluator";
import type { EvaluationOptions } from "@/lib/model/evaluator";
import { annuityFutureValue } from "@/lib/model/financial-math";
import { rankStrategies } from "@/lib/model/ranking";
import type { RankingRow, RankingTable } from "@/lib/model/ranking";
import { parsePremiumPlan } from "@/lib/model/simulator";
import { createTaxEngine } from "@/lib/model/tax";
import type { TaxEngine } from "@/lib/model/tax";
import { validateComparison } from "@/lib/model/validation";
import type { ValidationWarning } from "@/lib/model/validation";

export interface CompareOptions {
  /** Checked between evaluations; an abort ranks what was already evaluated. */
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
}

export interface DirectInvestmentBaseline {
  terminalValue: number;
  totalContributions: number;
  capitalGainsTax: number;
  netBenefit: number;
}

/** Key of the direct-investment candidate in a recommendation. */
export const DIRECT_INVESTMENT_KEY = "direct";

export interface Recommendation {
  /** Label of the winning candidate. */
  strategy: string;
  key: string;
  expectedValue: number;
  /** Over holding the policy to maturity. */
  advantageOverPolicy: number;
  advantageOverDirectInvestment: number;
}

export interface ComparisonResult {
  input: ComparisonInput;
  ranking: RankingTable;
  /** Evaluated results in catalog order. */
  results: readonly StrategyResult[];
  evaluated: number;
  total: number;
  cancelled: boolean;
  warnings: ValidationWarning[];
  baseline: DirectInvestmentBaseline;
  /** Full withdrawal at the end of the period. */
  holdToMaturity: StrategyResult;
  recommendation: Recommendation;
}

/**
 * Premiums paid straight into the vehicle for the whole period: no policy,
 * no deduction. Each premium goes in at the start of its month and grows at
 * the vehicle's net monthly rate (annuity due).
 */
export function directInvestmentBaseline(
  planInput: PremiumPlanInput,
  vehicleInput: AlternativeVehicleInput
): DirectInvestmentBaseline {
  const plan = parsePremiumPlan(planInput);
  const vehicle = parseInput(AlternativeVehicleSchema, vehicleInput, "VEHICLE");
  const months = plan.periodYears * 12;
  const monthlyRate = (vehicle.annualReturn - vehicle.annualFee) / 12;
  const terminalValue =
    annuityFutureValue(plan.monthlyPremium, monthlyRate, months) * (1 + monthlyRate);
  const totalContributions = plan.monthlyPremium * months;
  const capitalGainsTax = vehicle.taxExempt
    ? 0
    : Math.max(0, terminalValue - totalContributions) * vehicle.capitalGainsTaxRate;
  return {
    terminalValue,
    totalContributions,
    capitalGainsTax,
    netBenefit: terminalValue - capitalGainsTax - totalContributions,
  };
}

export function compareStrategies(
  request: ComparisonRequest,
  options: CompareOptions = {}
): ComparisonResult {
  const input = getEffectiveComparisonInput(request);
  const validation = validateComparison(input);
  if (validation.errors.length > 0) {
    throw new InvalidInputError(validation.errors);
  }

  const catalog = createStrategyCatalog(input.ranges, input.plan.periodYears);
  const taxEngine = createTaxEngine(input.tax);
  const evaluation: EvaluationOptions = {
    reinvestment: input.reinvestment,
    vehicle: input.vehicle,
  };

  const total = catalog.count;
  const results: StrategyResult[] = [];
  let cancelled = false;

  for (const descriptor of catalog) {
    if (options.signal?.aborted) {
      cancelled = true;
      console.warn(`[Compare] Cancelled after ${results.length} of ${total} strategies`);
      break;
    }
    results.push(evaluateStrategy(input.plan, taxEngine, descriptor, evaluation));
    options.onProgress?.(results.length, total);
  }

  const ranking = rankStrategies(results);
  const baseline = directInvestmentBaseline(input.plan, input.vehicle);
  const holdToMaturity = evaluateStrategy(
    input.plan,
    taxEngine,
    { kind: "FULL_WITHDRAWAL", year: input.plan.periodYears },
    evaluation
  );

  return {
    input,
    ranking,
    results,
    evaluated: results.length,
    total,
    cancelled,
    warnings: validation.warnings,
    baseline,
    holdToMaturity,
    recommendation: recommend(ranking[0], holdToMaturity, baseline),
  };
}

/**
 * Best of the top-ranked strategy, holding to maturity and investing
 * directly. Ties go to the earlier candidate in that order.
 */
function recommend(
  top: RankingRow | undefined,
  holdToMaturity: StrategyResult,
  baseline: DirectInvestmentBaseline
): Recommendation {
  const policy = {
    strategy: holdToMaturity.label,
    key: holdToMaturity.key,
    value: holdToMaturity.netBenefit,
  };
  const candidates = [
    ...(top ? [{ strategy: top.strategyLabel, key: top.key, value: top.netBenefit }] : []),
    policy,
    { strategy: "Direct investment", key: DIRECT_INVESTMENT_KEY, value: baseline.netBenefit },
  ];
  const best = candidates.reduce((winner, candidate) =>
    candidate.value > winner.value ? candidate : winner
  );
  return {
    strategy: best.strategy,
    key: best.key,
    expectedValue: best.value,
    advantageOverPolicy: best.value - holdToMaturity.netBenefit,
    advantageOverDirectInvestment: best.value - baseline.netBenefit,
  };
}

export interface BestWithdrawalYear {
  bestYear: number;
  best: StrategyResult;
  /** One full-withdrawal result per year, year 1 first. */
  results: StrategyResult[];
}

/** Full withdrawal at every year up to maxYears; the earliest year wins ties. */
export function findBestWithdrawalYear(
  planInput: PremiumPlanInput,
  taxEngine: TaxEngine,
  maxYears?: number,
  options: EvaluationOptions = {}
): BestWithdrawalYear {
  const plan = parsePremiumPlan(planInput);
  const limit = maxYears ?? plan.periodYears;
  const years = Math.min(Math.floor(limit), plan.periodYears);
  if (!(years >= 1)) {
    throw invalidInput("INVALID_MAX_YEARS", `maxYears must be at least 1 (got ${limit})`);
  }
  const results: StrategyResult[] = [];
  let bestYear = 1;
  for (let year = 1; year <= years; year++) {
    results.push(evaluateStrategy(plan, taxEngine, { kind: "FULL_WITHDRAWAL", year }, options));
  }
  results.forEach((result, index) => {
    const current = results[bestYear - 1];
    if (current && result.netBenefit > current.netBenefit) bestYear = index + 1;
  });
  const best = results[bestYear - 1];
  if (!best) throw new Error("No withdrawal year was evaluated");
  return { bestYear, best, results };
}

export interface IncomeScenario {
  name: string;
  taxableIncome: number;
}

export interface IncomeScenarioResult extends IncomeScenario {
  result: StrategyResult;
}

/** Evaluate one strategy under several taxable incomes, keeping the rest of the request. */
export function compareIncomeScenarios(
  request: ComparisonRequest,
  descriptor: StrategyDescriptor,
  scenarios: readonly IncomeScenario[]
): IncomeScenarioResult[] {
  const input = getEffectiveComparisonInput(request);
  const evaluation: EvaluationOptions = {
    reinvestment: input.reinvestment,
    vehicle: input.vehicle,
  };
  return scenarios.map((scenario) => ({
    ...scenario,
    result: evaluateStrategy(
      input.plan,
      createTaxEngine({ ...input.tax, taxableIncome: scenario.taxableIncome }),
      descriptor,
      evaluation
    ),
  }));
}
