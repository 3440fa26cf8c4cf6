/**
 * Deduction reform impact: how a lower deduction limit from a given policy
 * year changes the value of surrendering in each of the years that follow.
 *
 * Policy years before `reformYear` earn savings on the current deduction;
 * `reformYear` and later earn them on min(annual premium, new limit).
 */

import type { PremiumPlanInput, StrategyResult, TaxReformInput } from "@/lib/types/zod";
import { TaxReformSchema } from "@/lib/types/zod";
import { invalidInput, parseInput } from "@/lib/model/errors";
import { evaluateStrategy } from "@/lib/model/evaluator";
import type { EvaluationOptions } from "@/lib/model/evaluator";
import { createCashflowSimulator } from "@/lib/model/simulator";
import type { TaxEngine } from "@/lib/model/tax";

export interface TaxReformRow {
  withdrawalYear: number;
  oldRuleYears: number;
  newRuleYears: number;
  oldRuleSavings: number;
  newRuleSavings: number;
  totalSavings: number;
  premiumsPaid: number;
  /** Balance less the surrender deduction. */
  surrenderValue: number;
  /** Surrender value less the one-time withdrawal tax. */
  netValue: number;
  /** netValue + totalSavings − premiumsPaid. */
  netBenefit: number;
  /** Income tax saving lost to the lower deduction over the new-rule years. */
  savingsReduction: number;
}

export interface TaxReformImpact {
  reformYear: number;
  oldDeduction: number;
  newDeduction: number;
  /** Income tax saving lost per year under the new rules. */
  annualImpact: number;
  /** Full withdrawal in the last year wholly under the old rules, if there is one. */
  beforeReform: StrategyResult | null;
  rows: TaxReformRow[];
  /** Withdrawal year with the highest net benefit; earliest wins ties. */
  bestWithdrawalYear: number | null;
}

export function analyzeTaxReformImpact(
  planInput: PremiumPlanInput,
  taxEngine: TaxEngine,
  reformInput: TaxReformInput,
  options: EvaluationOptions = {}
): TaxReformImpact {
  const sim = createCashflowSimulator(planInput, taxEngine, { reinvestment: options.reinvestment });
  const { plan } = sim;
  const reform = parseInput(TaxReformSchema, reformInput, "REFORM");
  if (reform.reformYear > plan.periodYears) {
    throw invalidInput(
      "REFORM_YEAR_BEYOND_PERIOD",
      `Reform year ${reform.reformYear} is beyond the ${plan.periodYears}-year period`
    );
  }

  const annualPremium = plan.monthlyPremium * 12;
  const oldDeduction = taxEngine.deduction(annualPremium);
  const newDeduction = Math.min(annualPremium, reform.newDeductionLimit);
  const marginalRate = taxEngine.marginalRate(taxEngine.context.taxableIncome);
  const oldAnnualSavings = taxEngine.taxSavings(oldDeduction).total;
  const newAnnualSavings = taxEngine.taxSavings(newDeduction).total;
  const oldRuleLimit = reform.reformYear - 1;

  const beforeReform =
    oldRuleLimit >= 1
      ? evaluateStrategy(plan, taxEngine, { kind: "FULL_WITHDRAWAL", year: oldRuleLimit }, options)
      : null;

  const lastYear = Math.min(plan.periodYears, reform.reformYear + reform.yearsAfterReform - 1);
  const rows: TaxReformRow[] = [];
  for (let year = reform.reformYear; year <= lastYear; year++) {
    sim.advanceTo(year * 12);
    const { proceeds, tax } = sim.previewLiquidation();
    const premiumsPaid = sim.state.contributions;
    const oldRuleYears = Math.min(year, oldRuleLimit);
    const newRuleYears = year - oldRuleYears;
    const oldRuleSavings = oldAnnualSavings * oldRuleYears;
    const newRuleSavings = newAnnualSavings * newRuleYears;
    const totalSavings = oldRuleSavings + newRuleSavings;
    const netValue = proceeds - tax;

    rows.push({
      withdrawalYear: year,
      oldRuleYears,
      newRuleYears,
      oldRuleSavings,
      newRuleSavings,
      totalSavings,
      premiumsPaid,
      surrenderValue: proceeds,
      netValue,
      netBenefit: netValue + totalSavings - premiumsPaid,
      savingsReduction: (oldDeduction - newDeduction) * newRuleYears * marginalRate,
    });
  }

  let best: TaxReformRow | null = null;
  for (const row of rows) {
    if (!best || row.netBenefit > best.netBenefit) best = row;
  }

  return {
    reformYear: reform.reformYear,
    oldDeduction,
    newDeduction,
    annualImpact: (oldDeduction - newDeduction) * marginalRate,
    beforeReform,
    rows,
    bestWithdrawalYear: best ? best.withdrawalYear : null,
  };
}
