/**
 * Stateless time-value-of-money helpers shared by the simulator and evaluator.
 * Rates are per period (decimal).
 */

import { invalidInput } from "@/lib/model/errors";

function assertPeriods(periods: number): void {
  if (!Number.isFinite(periods) || periods < 0) {
    throw invalidInput("INVALID_PERIODS", `Periods must be 0 or more (got ${periods})`);
  }
}

export function futureValue(principal: number, rate: number, periods: number): number {
  assertPeriods(periods);
  return principal * Math.pow(1 + rate, periods);
}

export function presentValue(amount: number, rate: number, periods: number): number {
  assertPeriods(periods);
  return amount / Math.pow(1 + rate, periods);
}

/**
 * Future value of an ordinary annuity (payment at the end of each period).
 * A zero rate uses the linear form payment × periods.
 */
export function annuityFutureValue(payment: number, rate: number, periods: number): number {
  assertPeriods(periods);
  if (rate === 0) return payment * periods;
  return (payment * (Math.pow(1 + rate, periods) - 1)) / rate;
}

/** Present value of an ordinary annuity. Zero rate: payment × periods. */
export function annuityPresentValue(payment: number, rate: number, periods: number): number {
  assertPeriods(periods);
  if (rate === 0) return payment * periods;
  return (payment * (1 - Math.pow(1 + rate, -periods))) / rate;
}

/** NPV with the first flow at t = 0. */
export function netPresentValue(rate: number, cashFlows: readonly number[]): number {
  if (cashFlows.length === 0) {
    throw invalidInput("EMPTY_CASH_FLOWS", "Cash flows cannot be empty");
  }
  return cashFlows.reduce((sum, cf, t) => sum + cf / Math.pow(1 + rate, t), 0);
}

export interface IrrOptions {
  guess?: number;
  maxIterations?: number;
  tolerance?: number;
}

/**
 * Internal rate of return by Newton's method.
 * Returns null when there is no solution: no sign change in the flows, a flat
 * derivative, a non-finite step, or no convergence within maxIterations.
 */
export function internalRateOfReturn(
  cashFlows: readonly number[],
  options: IrrOptions = {}
): number | null {
  if (cashFlows.length < 2) {
    throw invalidInput("INSUFFICIENT_CASH_FLOWS", "IRR needs at least two cash flows");
  }
  const hasPositive = cashFlows.some((cf) => cf > 0);
  const hasNegative = cashFlows.some((cf) => cf < 0);
  if (!hasPositive || !hasNegative) return null;

  const maxIterations = options.maxIterations ?? 100;
  const tolerance = options.tolerance ?? 1e-6;
  let rate = options.guess ?? 0.1;

  for (let i = 0; i < maxIterations; i++) {
    let npv = 0;
    let derivative = 0;
    for (let t = 0; t < cashFlows.length; t++) {
      const cf = cashFlows[t] ?? 0;
      npv += cf / Math.pow(1 + rate, t);
      derivative += (-t * cf) / Math.pow(1 + rate, t + 1);
    }
    if (Math.abs(derivative) < 1e-10) return null;

    const next = rate - npv / derivative;
    if (!Number.isFinite(next) || next <= -1) return null;
    if (Math.abs(next - rate) < tolerance) return next;
    rate = next;
  }
  return null;
}
