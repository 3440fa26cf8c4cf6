/**
 * Reference plans and requests shared by the model tests.
 */

import type { ComparisonRequest, PremiumPlan, TaxContextInput } from "@/lib/types/zod";
import {
  DEFAULT_BALANCE_FEE_RATE,
  DEFAULT_SETUP_FEE_RATE,
  DEFAULT_WITHDRAWAL_FEE_RATE,
} from "@/lib/model/constants";

/** 9,000/month at 1.25% for 20 years with the default fees. */
export function createBasePlan(overrides?: Partial<PremiumPlan>): PremiumPlan {
  return {
    monthlyPremium: 9_000,
    annualGrowthRate: 0.0125,
    periodYears: 20,
    setupFeeRate: DEFAULT_SETUP_FEE_RATE,
    balanceFeeRate: DEFAULT_BALANCE_FEE_RATE,
    withdrawalFeeRate: DEFAULT_WITHDRAWAL_FEE_RATE,
    ...overrides,
  };
}

/** No growth and no fees: every balance is a plain sum of premiums. */
export function createFlatPlan(overrides?: Partial<PremiumPlan>): PremiumPlan {
  return createBasePlan({
    monthlyPremium: 10_000,
    annualGrowthRate: 0,
    periodYears: 10,
    setupFeeRate: 0,
    balanceFeeRate: 0,
    withdrawalFeeRate: 0,
    ...overrides,
  });
}

export function createBaseTaxContext(overrides?: Partial<TaxContextInput>): TaxContextInput {
  return { taxableIncome: 6_000_000, ...overrides };
}

export function createBaseRequest(overrides?: Partial<ComparisonRequest>): ComparisonRequest {
  return {
    plan: createBasePlan(),
    tax: createBaseTaxContext(),
    ranges: {
      withdrawalIntervals: [2],
      withdrawalRatios: [0.5],
    },
    ...overrides,
  };
}

export const COMPARISON_SCENARIOS = {
  base: createBaseRequest(),
  wideSearch: createBaseRequest({
    ranges: {
      withdrawalIntervals: [2, 5],
      withdrawalRatios: [0.25, 0.5],
      fullWithdrawalYears: [10, 15, 20],
      switchYears: [5, 10],
      switchFeeRates: [0, 0.02],
    },
  }),
  zeroIncome: createBaseRequest({ tax: { taxableIncome: 0 } }),
} satisfies Record<string, ComparisonRequest>;
