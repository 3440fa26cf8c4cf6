/**
 * Resolve a comparison request's optional fields to the values the engine
 * uses, so callers and exports see exactly what was simulated.
 */

import type { ComparisonInput, ComparisonRequest } from "@/lib/types/zod";
import { ComparisonInputSchema, ComparisonRequestSchema } from "@/lib/types/zod";
import { DEFAULT_TAXABLE_INCOME } from "@/lib/model/constants";
import { parseInput } from "@/lib/model/errors";

/**
 * Defaults: taxable income 5,000,000, the default bracket table, a 1% deposit
 * for reinvestment, and a switch vehicle that earns the policy's growth rate.
 */
export function getEffectiveComparisonInput(request: ComparisonRequest): ComparisonInput {
  const parsed = parseInput(ComparisonRequestSchema, request, "REQUEST");
  return parseInput(
    ComparisonInputSchema,
    {
      plan: parsed.plan,
      tax: {
        ...parsed.tax,
        taxableIncome: parsed.tax?.taxableIncome ?? DEFAULT_TAXABLE_INCOME,
      },
      ranges: parsed.ranges,
      reinvestment: parsed.reinvestment ?? {},
      vehicle: {
        ...parsed.vehicle,
        annualReturn: parsed.vehicle?.annualReturn ?? parsed.plan.annualGrowthRate,
      },
    },
    "REQUEST"
  );
}
