/**
 * Premium deduction and income tax arithmetic.
 * One engine is built per comparison run from a TaxContext and handed to the
 * simulator and evaluator; it holds no mutable state.
 */

import type { TaxBracket, TaxContext, TaxContextInput } from "@/lib/types/zod";
import { TaxContextSchema } from "@/lib/types/zod";
import {
  DEDUCTION_CAP,
  ONE_TIME_INCOME_ALLOWANCE,
  ONE_TIME_INCOME_INCLUSION_RATE,
} from "@/lib/model/constants";
import { invalidInput, parseInput } from "@/lib/model/errors";

/** Piecewise deduction table: premium up to `upTo` → premium × rate + base. */
const DEDUCTION_BRACKETS = [
  { upTo: 25_000, rate: 0.5, base: 0 },
  { upTo: 50_000, rate: 0.25, base: 12_500 },
  { upTo: 100_000, rate: 0.2, base: 15_000 },
  { upTo: Infinity, rate: 0, base: DEDUCTION_CAP },
] as const;

export interface TaxSavings {
  incomeTaxSavings: number;
  residentTaxSavings: number;
  total: number;
}

export interface AnnualTaxSavings extends TaxSavings {
  deduction: number;
}

export interface DeductionBreakdown {
  annualPremium: number;
  deduction: number;
  /** 0-based index into the deduction table. */
  bracketIndex: number;
  /** deduction / premium; 0 when the premium is 0. */
  effectiveRate: number;
  capReached: boolean;
}

/** Bracket with its quick deduction resolved. */
export interface ResolvedBracket {
  threshold: number | null;
  rate: number;
  quickDeduction: number;
}

export interface TaxEngine {
  readonly context: Readonly<TaxContext>;
  readonly brackets: readonly ResolvedBracket[];
  deduction(annualPremium: number): number;
  deductionBreakdown(annualPremium: number): DeductionBreakdown;
  taxSavings(deductionAmount: number, taxableIncome?: number): TaxSavings;
  annualTaxSavings(annualPremium: number): AnnualTaxSavings;
  oneTimeWithdrawalTax(profit: number, taxableIncome?: number): number;
  progressiveIncomeTax(taxableIncome: number): number;
  marginalRate(taxableIncome: number): number;
}

function deductionBracketIndex(annualPremium: number): number {
  const index = DEDUCTION_BRACKETS.findIndex((b) => annualPremium <= b.upTo);
  return index === -1 ? DEDUCTION_BRACKETS.length - 1 : index;
}

/** Premium-derived deduction, never above DEDUCTION_CAP. */
export function calculateDeduction(annualPremium: number): number {
  if (!Number.isFinite(annualPremium) || annualPremium < 0) {
    throw invalidInput(
      "NEGATIVE_PREMIUM",
      `Annual premium must be 0 or more (got ${annualPremium})`
    );
  }
  if (annualPremium === 0) return 0;
  const bracket = DEDUCTION_BRACKETS[deductionBracketIndex(annualPremium)];
  if (!bracket) return DEDUCTION_CAP;
  return Math.min(annualPremium * bracket.rate + bracket.base, DEDUCTION_CAP);
}

/**
 * Fill in missing quick deductions so the tax curve is continuous:
 * q[i] = q[i-1] + threshold[i-1] × (rate[i] − rate[i-1]).
 */
export function resolveBrackets(brackets: readonly TaxBracket[]): ResolvedBracket[] {
  const resolved: ResolvedBracket[] = [];
  for (const bracket of brackets) {
    const prev = resolved[resolved.length - 1];
    const derived =
      prev && prev.threshold !== null
        ? prev.quickDeduction + prev.threshold * (bracket.rate - prev.rate)
        : 0;
    resolved.push({
      threshold: bracket.threshold,
      rate: bracket.rate,
      quickDeduction: bracket.quickDeduction ?? derived,
    });
  }
  return resolved;
}

function findBracket(brackets: readonly ResolvedBracket[], income: number): ResolvedBracket | undefined {
  return brackets.find((b) => b.threshold === null || income <= b.threshold);
}

export function createTaxEngine(input: TaxContextInput): TaxEngine {
  const context = parseInput(TaxContextSchema, input, "TAX_CONTEXT");
  const brackets = resolveBrackets(context.brackets);

  const progressiveIncomeTax = (taxableIncome: number): number => {
    if (!(taxableIncome > 0)) return 0;
    const bracket = findBracket(brackets, taxableIncome);
    if (!bracket) return 0;
    return taxableIncome * bracket.rate - bracket.quickDeduction;
  };

  const marginalRate = (taxableIncome: number): number => {
    if (!(taxableIncome > 0)) return 0;
    return findBracket(brackets, taxableIncome)?.rate ?? 0;
  };

  const taxSavings = (
    deductionAmount: number,
    taxableIncome: number = context.taxableIncome
  ): TaxSavings => {
    if (!(taxableIncome > 0) || !(deductionAmount > 0)) {
      return { incomeTaxSavings: 0, residentTaxSavings: 0, total: 0 };
    }
    const reducedIncome = Math.max(0, taxableIncome - deductionAmount);
    const incomeTaxSavings =
      progressiveIncomeTax(taxableIncome) - progressiveIncomeTax(reducedIncome);
    const residentTaxSavings = (taxableIncome - reducedIncome) * context.residentTaxRate;
    return {
      incomeTaxSavings,
      residentTaxSavings,
      total: incomeTaxSavings + residentTaxSavings,
    };
  };

  const oneTimeWithdrawalTax = (
    profit: number,
    taxableIncome: number = context.taxableIncome
  ): number => {
    const taxablePortion =
      Math.max(0, profit - ONE_TIME_INCOME_ALLOWANCE) * ONE_TIME_INCOME_INCLUSION_RATE;
    if (taxablePortion <= 0) return 0;
    const base = Math.max(0, taxableIncome);
    return progressiveIncomeTax(base + taxablePortion) - progressiveIncomeTax(base);
  };

  return {
    context,
    brackets,
    deduction: calculateDeduction,
    deductionBreakdown(annualPremium: number): DeductionBreakdown {
      const deduction = calculateDeduction(annualPremium);
      return {
        annualPremium,
        deduction,
        bracketIndex: deductionBracketIndex(annualPremium),
        effectiveRate: annualPremium > 0 ? deduction / annualPremium : 0,
        capReached: deduction >= DEDUCTION_CAP,
      };
    },
    taxSavings,
    annualTaxSavings(annualPremium: number): AnnualTaxSavings {
      const deduction = calculateDeduction(annualPremium);
      return { deduction, ...taxSavings(deduction) };
    },
    oneTimeWithdrawalTax,
    progressiveIncomeTax,
    marginalRate,
  };
}
