/**
 * Deduction planning across several contracts. Each contract can be claimed
 * on its own premium or all premiums together; splitting a budget keeps each
 * contract in the steeper part of the deduction table.
 */

import {
  DEDUCTION_SATURATION_PREMIUM,
  PREMIUM_ALLOCATION_STEP,
} from "@/lib/model/constants";
import { invalidInput } from "@/lib/model/errors";
import { calculateDeduction } from "@/lib/model/tax";

export interface ContractDeduction {
  contractCount: number;
  totalPremium: number;
  /** Sum of each contract's own deduction. */
  individualTotal: number;
  /** Deduction on the premiums added together. */
  combinedDeduction: number;
  bestDeduction: number;
  individualIsBetter: boolean;
  difference: number;
}

export interface PremiumDistribution {
  /** Annual premium per contract; the last takes whatever is left. */
  allocation: number[];
  totalDeduction: number;
  totalBudget: number;
  contractCount: number;
  /** totalDeduction / totalBudget; 0 for a zero budget. */
  averageRate: number;
}

/** Compare claiming each annual premium separately against claiming their sum. */
export function deductionForContracts(premiums: readonly number[]): ContractDeduction {
  const totalPremium = premiums.reduce((sum, premium) => sum + premium, 0);
  const individualTotal = premiums.reduce((sum, premium) => sum + calculateDeduction(premium), 0);
  const combinedDeduction = calculateDeduction(totalPremium);
  return {
    contractCount: premiums.length,
    totalPremium,
    individualTotal,
    combinedDeduction,
    bestDeduction: Math.max(individualTotal, combinedDeduction),
    individualIsBetter: individualTotal > combinedDeduction,
    difference: Math.abs(individualTotal - combinedDeduction),
  };
}

/**
 * Split an annual budget over `contractCount` contracts to maximise the summed
 * deduction. Every contract but the last is tried in `step` increments up to
 * the saturation premium; the first best split found is kept.
 */
export function optimizePremiumDistribution(
  totalBudget: number,
  contractCount = 2,
  step: number = PREMIUM_ALLOCATION_STEP
): PremiumDistribution {
  if (!Number.isFinite(totalBudget) || totalBudget < 0) {
    throw invalidInput("INVALID_BUDGET", `Budget must be 0 or more (got ${totalBudget})`);
  }
  if (!Number.isInteger(contractCount) || contractCount < 1) {
    throw invalidInput(
      "INVALID_CONTRACT_COUNT",
      `Contract count must be a whole number of at least 1 (got ${contractCount})`
    );
  }
  if (!(step > 0)) {
    throw invalidInput("INVALID_STEP", `Step must be positive (got ${step})`);
  }

  const maxPerContract = Math.min(DEDUCTION_SATURATION_PREMIUM, totalBudget);
  let bestAllocation: number[] = [totalBudget];
  let bestDeduction = -Infinity;

  const search = (remaining: number, contractsLeft: number, allocation: number[]): void => {
    if (contractsLeft === 1) {
      const candidate = [...allocation, remaining];
      const deduction = candidate.reduce((sum, premium) => sum + calculateDeduction(premium), 0);
      if (deduction > bestDeduction) {
        bestDeduction = deduction;
        bestAllocation = candidate;
      }
      return;
    }
    const limit = Math.min(maxPerContract, remaining);
    for (let k = 0; k * step <= limit; k++) {
      search(remaining - k * step, contractsLeft - 1, [...allocation, k * step]);
    }
  };
  search(totalBudget, contractCount, []);

  return {
    allocation: bestAllocation,
    totalDeduction: bestDeduction,
    totalBudget,
    contractCount,
    averageRate: totalBudget > 0 ? bestDeduction / totalBudget : 0,
  };
}
