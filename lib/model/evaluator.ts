/**
 * Strategy evaluator: replays one descriptor on a fresh simulator.
 * Pure and deterministic: every call starts again from month 0.
 */

import type {
  AlternativeVehicle,
  PremiumPlan,
  PremiumPlanInput,
  ReinvestmentAccount,
  StrategyBreakdown,
  StrategyDescriptor,
  StrategyResult,
} from "@/lib/types/zod";
import { AlternativeVehicleSchema, StrategyDescriptorSchema } from "@/lib/types/zod";
import { invalidInput, parseInput } from "@/lib/model/errors";
import { internalRateOfReturn } from "@/lib/model/financial-math";
import { createCashflowSimulator, parsePremiumPlan } from "@/lib/model/simulator";
import type { SimulationSummary } from "@/lib/model/simulator";
import type { TaxEngine } from "@/lib/model/tax";
import { strategyKey, strategyLabel } from "@/lib/model/catalog";

export interface EvaluationOptions {
  reinvestment?: Partial<ReinvestmentAccount>;
  /** Switch destination. annualReturn defaults to the plan's growth rate. */
  vehicle?: Partial<AlternativeVehicle>;
}

export function resolveVehicle(
  plan: PremiumPlan,
  vehicle: Partial<AlternativeVehicle> = {}
): AlternativeVehicle {
  return parseInput(
    AlternativeVehicleSchema,
    { annualReturn: plan.annualGrowthRate, ...vehicle },
    "VEHICLE"
  );
}

/** Run the descriptor to close-out and return the raw simulation summary. */
export function simulateStrategy(
  planInput: PremiumPlanInput,
  taxEngine: TaxEngine,
  descriptor: StrategyDescriptor,
  options: EvaluationOptions = {}
): SimulationSummary {
  const plan = parsePremiumPlan(planInput);
  const strategy = parseInput(StrategyDescriptorSchema, descriptor, "STRATEGY");
  const horizon = plan.periodYears * 12;
  const sim = createCashflowSimulator(plan, taxEngine, { reinvestment: options.reinvestment });

  switch (strategy.kind) {
    case "FULL_WITHDRAWAL": {
      if (strategy.year > plan.periodYears) {
        throw invalidInput(
          "WITHDRAWAL_YEAR_BEYOND_PERIOD",
          `Full withdrawal year ${strategy.year} is beyond the ${plan.periodYears}-year period`
        );
      }
      sim.advanceTo(strategy.year * 12);
      break;
    }
    case "PARTIAL_WITHDRAWAL": {
      const step = strategy.interval * 12;
      for (let month = step; month < horizon; month += step) {
        sim.advanceTo(month);
        sim.partialWithdrawal(strategy.ratio);
      }
      sim.advanceTo(horizon);
      break;
    }
    case "SWITCH": {
      if (strategy.year > plan.periodYears) {
        throw invalidInput(
          "SWITCH_YEAR_BEYOND_PERIOD",
          `Switch year ${strategy.year} is beyond the ${plan.periodYears}-year period`
        );
      }
      sim.advanceTo(strategy.year * 12);
      sim.switchToVehicle(resolveVehicle(plan, options.vehicle), strategy.feeRate);
      sim.advanceTo(horizon);
      break;
    }
  }
  return sim.finish();
}

/**
 * Yearly cash flows seen by the policyholder: premiums paid at the start of
 * each year, tax savings received at its end, net close-out value last.
 */
export function yearlyCashFlows(summary: SimulationSummary): number[] {
  const years = summary.yearRows.length;
  const flows = new Array<number>(years + 1).fill(0);
  let prevContributions = 0;
  let prevSavings = 0;
  summary.yearRows.forEach((row, index) => {
    flows[index] = (flows[index] ?? 0) - (row.contributions - prevContributions);
    flows[index + 1] = (flows[index + 1] ?? 0) + (row.taxSavings - prevSavings);
    prevContributions = row.contributions;
    prevSavings = row.taxSavings;
  });
  flows[years] =
    (flows[years] ?? 0) + summary.terminalValue - summary.closingFees - summary.closingTax;
  return flows;
}

export function evaluateStrategy(
  plan: PremiumPlanInput,
  taxEngine: TaxEngine,
  descriptor: StrategyDescriptor,
  options: EvaluationOptions = {}
): StrategyResult {
  const summary = simulateStrategy(plan, taxEngine, descriptor, options);
  const { state } = summary;
  const flows = yearlyCashFlows(summary);

  const breakdown: StrategyBreakdown = {
    terminalValue: summary.terminalValue,
    totalContributions: state.contributions,
    totalFees: state.fees,
    withdrawalFees: state.withdrawalFees,
    totalTax: state.oneTimeTax + state.saleTax,
    taxSavings: state.taxSavings,
    withdrawnAmount: state.withdrawnAmount,
    closingFees: summary.closingFees,
    closingTax: summary.closingTax,
    annualizedReturn: flows.length >= 2 ? internalRateOfReturn(flows) : null,
  };

  return Object.freeze({
    descriptor: Object.freeze({ ...descriptor }),
    key: strategyKey(descriptor),
    label: strategyLabel(descriptor),
    netBenefit: summary.netBenefit,
    breakdown: Object.freeze(breakdown),
  });
}
