/**
 * Validation and guardrails for a comparison run.
 * Errors block the run; warnings are reported beside the ranking.
 */

import type { ComparisonInput } from "@/lib/types/zod";
import {
  DEDUCTION_SATURATION_PREMIUM,
  LARGE_SEARCH_SPACE_THRESHOLD,
} from "@/lib/model/constants";
import { createStrategyCatalog } from "@/lib/model/catalog";
import { formatCurrency } from "@/lib/utils/format";

export interface ValidationError {
  code: string;
  message: string;
}

export interface ValidationWarning {
  code: string;
  message: string;
}

export interface ValidationResult {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export function validateComparison(input: ComparisonInput): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];
  const { plan, ranges, tax } = input;
  const period = plan.periodYears;

  for (const year of ranges.fullWithdrawalYears) {
    if (year > period) {
      errors.push({
        code: "WITHDRAWAL_YEAR_BEYOND_PERIOD",
        message: `Full withdrawal year ${year} is beyond the ${period}-year period`,
      });
    }
  }

  const annualPremium = plan.monthlyPremium * 12;
  if (annualPremium > DEDUCTION_SATURATION_PREMIUM) {
    warnings.push({
      code: "PREMIUM_ABOVE_DEDUCTION_CAP",
      message: `Annual premium ${formatCurrency(annualPremium)} is above ${formatCurrency(DEDUCTION_SATURATION_PREMIUM)}; the deduction no longer grows`,
    });
  }

  if (plan.annualGrowthRate < 0) {
    warnings.push({
      code: "NEGATIVE_GROWTH",
      message: "Growth rate is negative; every strategy loses principal",
    });
  }

  if (tax.taxableIncome === 0) {
    warnings.push({
      code: "NO_TAXABLE_INCOME",
      message: "Taxable income is 0; the deduction saves no tax",
    });
  }

  const dropped = [
    ...ranges.withdrawalIntervals.filter((i) => i >= period),
    ...ranges.switchYears.filter((y) => y >= period),
  ];
  if (dropped.length > 0) {
    warnings.push({
      code: "DEGENERATE_RANGE_ENTRIES",
      message: `Intervals and switch years of ${period} or more never take effect and are skipped (${dropped.join(", ")})`,
    });
  }

  if (errors.length > 0) return { errors, warnings };

  const { count } = createStrategyCatalog(ranges, period);
  if (count === 0) {
    warnings.push({
      code: "EMPTY_SEARCH_SPACE",
      message: "No strategies to compare; the ranking will be empty",
    });
  } else if (count > LARGE_SEARCH_SPACE_THRESHOLD) {
    warnings.push({
      code: "LARGE_SEARCH_SPACE",
      message: `${count} strategies will be evaluated; consider narrowing the ranges`,
    });
  }

  return { errors, warnings };
}
