/**
 * Break-even analysis: the first policy year in which surrendering returns at
 * least the premiums paid, counting the tax savings accrued so far.
 */

import type { PremiumPlanInput } from "@/lib/types/zod";
import { MAX_BREAK_EVEN_YEARS } from "@/lib/model/constants";
import { createCashflowSimulator } from "@/lib/model/simulator";
import type { TaxEngine } from "@/lib/model/tax";

export interface BreakEvenRow {
  year: number;
  premiumsPaid: number;
  /** Balance less the surrender deduction. */
  surrenderValue: number;
  /** Surrender value less the one-time withdrawal tax. */
  netValue: number;
  taxSavings: number;
  totalValue: number;
  breakEven: boolean;
}

export interface BreakEvenAnalysis {
  breakEvenYear: number | null;
  breakEvenValue: number | null;
  rows: BreakEvenRow[];
}

export function analyzeBreakEven(plan: PremiumPlanInput, taxEngine: TaxEngine): BreakEvenAnalysis {
  const sim = createCashflowSimulator(plan, taxEngine);
  const years = Math.min(sim.plan.periodYears, MAX_BREAK_EVEN_YEARS);
  const rows: BreakEvenRow[] = [];
  let breakEvenYear: number | null = null;
  let breakEvenValue: number | null = null;

  for (let year = 1; year <= years; year++) {
    sim.advanceTo(year * 12);
    const { proceeds, tax } = sim.previewLiquidation();
    const { contributions, taxSavings } = sim.state;
    const netValue = proceeds - tax;
    const totalValue = netValue + taxSavings;
    const breakEven = totalValue >= contributions;

    rows.push({
      year,
      premiumsPaid: contributions,
      surrenderValue: proceeds,
      netValue,
      taxSavings,
      totalValue,
      breakEven,
    });
    if (breakEven && breakEvenYear === null) {
      breakEvenYear = year;
      breakEvenValue = totalValue;
    }
  }

  return { breakEvenYear, breakEvenValue, rows };
}
