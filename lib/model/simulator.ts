/**
 * Month-by-month cash-flow simulation of one policy run.
 *
 * Phases: ACCUMULATING → (partial withdrawals | switch)* → TERMINAL, with
 * SWITCHED while premiums flow into the alternative vehicle. Each month
 * applies the net premium, growth, then the balance fee. Tax savings accrue
 * once per completed policy year while premiums go into the policy.
 *
 * Net benefit = terminal value + tax savings − contributions − closing fees −
 * closing tax. Fees and taxes of mid-course events are netted out of the
 * proceeds before they reach a balance, so every cost is counted once.
 */

import type {
  AlternativeVehicle,
  PremiumPlan,
  PremiumPlanInput,
  ReinvestmentAccount,
} from "@/lib/types/zod";
import { PremiumPlanSchema, ReinvestmentAccountSchema } from "@/lib/types/zod";
import {
  SURRENDER_DEDUCTION_INITIAL_RATE,
  SURRENDER_DEDUCTION_STEP,
} from "@/lib/model/constants";
import { invalidInput, parseInput } from "@/lib/model/errors";
import { futureValue } from "@/lib/model/financial-math";
import type { TaxEngine } from "@/lib/model/tax";

export type SimulationPhase = "ACCUMULATING" | "SWITCHED" | "TERMINAL";

export interface SimulationState {
  month: number;
  phase: SimulationPhase;
  policyBalance: number;
  /** Premiums still attributed to the policy; shrinks with partial withdrawals. */
  contributionBase: number;
  reinvestmentBalance: number;
  reinvestmentBasis: number;
  vehicleBalance: number;
  vehicleBasis: number;
  /** All premiums paid, into the policy or the vehicle. */
  contributions: number;
  /** Every fee: setup, balance, vehicle expense, withdrawal, surrender, switch. */
  fees: number;
  /** Withdrawal-type fees only (withdrawal, surrender, switch). */
  withdrawalFees: number;
  taxSavings: number;
  withdrawnAmount: number;
  oneTimeTax: number;
  saleTax: number;
}

export interface SimulationYearRow {
  year: number;
  phase: SimulationPhase;
  policyBalance: number;
  reinvestmentBalance: number;
  vehicleBalance: number;
  contributions: number;
  fees: number;
  taxSavings: number;
  withdrawnAmount: number;
  oneTimeTax: number;
}

export interface WithdrawalEvent {
  type: "WITHDRAWAL";
  month: number;
  ratio: number;
  amount: number;
  fee: number;
  /** Share of the contribution base withdrawn with the amount. */
  basis: number;
  tax: number;
  netProceeds: number;
}

export interface SwitchEvent {
  type: "SWITCH";
  month: number;
  surrenderDeduction: number;
  tax: number;
  switchFee: number;
  /** Amount that seeds the vehicle. */
  invested: number;
}

export type SimulationEvent = WithdrawalEvent | SwitchEvent;

export interface PolicyLiquidation {
  surrenderDeduction: number;
  proceeds: number;
  profit: number;
  tax: number;
}

export interface SimulationSummary {
  state: Readonly<SimulationState>;
  /** Balances held at close-out, before closing fees and taxes. */
  terminalValue: number;
  closingFees: number;
  closingTax: number;
  netBenefit: number;
  events: readonly SimulationEvent[];
  yearRows: readonly SimulationYearRow[];
}

export interface CashflowSimulator {
  readonly plan: PremiumPlan;
  /** Snapshot of the running totals. */
  readonly state: Readonly<SimulationState>;
  readonly phase: SimulationPhase;
  readonly month: number;
  readonly remainingMonths: number;
  advanceMonth(): void;
  /** Advance until `month` months have elapsed since the start. */
  advanceTo(month: number): void;
  /** Withdraw `ratio` of the policy balance into the reinvestment account. */
  partialWithdrawal(ratio: number): WithdrawalEvent;
  /**
   * Surrender the policy and move the proceeds into `vehicle`, paying
   * `feeRate` on the lump sum and on every later premium. With no months
   * left there is nothing to accumulate: no event is recorded and the
   * policy is liquidated by finish().
   */
  switchToVehicle(vehicle: AlternativeVehicle, feeRate: number): SwitchEvent | null;
  /** Surrender value, profit and one-time tax if the policy were cashed in now. */
  previewLiquidation(): PolicyLiquidation;
  /** Close out at the current month: surrender what is left and sell every balance. */
  finish(): SimulationSummary;
}

export interface SimulatorOptions {
  /** Destination of partial-withdrawal proceeds. Defaults to a 1% deposit. */
  reinvestment?: Partial<ReinvestmentAccount>;
}

/** Surrender deduction rate after `years` elapsed: 10% falling linearly to 0% at year 10. */
export function surrenderDeductionRate(years: number): number {
  const rate = SURRENDER_DEDUCTION_INITIAL_RATE - SURRENDER_DEDUCTION_STEP * Math.max(0, years);
  // Rounded to whole basis points; the schedule moves in 1% steps.
  return Math.max(0, Math.round(rate * 10_000) / 10_000);
}

/** Parse a plan; fee rates outside [0, 1), a bad period or growth below -100% throw. */
export function parsePremiumPlan(plan: PremiumPlanInput): PremiumPlan {
  return parseInput(PremiumPlanSchema, plan, "PLAN");
}

function saleTax(balance: number, basis: number, rate: number, taxExempt: boolean): number {
  if (taxExempt) return 0;
  return Math.max(0, balance - basis) * rate;
}

export function createCashflowSimulator(
  planInput: PremiumPlanInput,
  taxEngine: TaxEngine,
  options: SimulatorOptions = {}
): CashflowSimulator {
  const plan = parsePremiumPlan(planInput);
  const reinvestment = parseInput(
    ReinvestmentAccountSchema,
    options.reinvestment ?? {},
    "REINVESTMENT"
  );
  const horizonMonths = plan.periodYears * 12;
  const monthlyRate = plan.annualGrowthRate / 12;
  const annualTaxSavings = taxEngine.annualTaxSavings(plan.monthlyPremium * 12).total;
  const events: SimulationEvent[] = [];
  const yearRows: SimulationYearRow[] = [];
  let vehicle: AlternativeVehicle | null = null;
  let switchFeeRate = 0;

  const s: SimulationState = {
    month: 0,
    phase: "ACCUMULATING",
    policyBalance: 0,
    contributionBase: 0,
    reinvestmentBalance: 0,
    reinvestmentBasis: 0,
    vehicleBalance: 0,
    vehicleBasis: 0,
    contributions: 0,
    fees: 0,
    withdrawalFees: 0,
    taxSavings: 0,
    withdrawnAmount: 0,
    oneTimeTax: 0,
    saleTax: 0,
  };

  const assertPhase = (expected: SimulationPhase, action: string): void => {
    if (s.phase !== expected) {
      throw new Error(`Cannot ${action} while ${s.phase.toLowerCase()}`);
    }
  };

  const liquidatePolicy = (): PolicyLiquidation => {
    const years = Math.floor(s.month / 12);
    const surrenderDeduction = s.policyBalance * surrenderDeductionRate(years);
    const proceeds = s.policyBalance - surrenderDeduction;
    const profit = proceeds - s.contributionBase;
    return {
      surrenderDeduction,
      proceeds,
      profit,
      tax: taxEngine.oneTimeWithdrawalTax(profit),
    };
  };

  const accumulatePolicy = (): void => {
    const premium = plan.monthlyPremium;
    const setupFee = premium * plan.setupFeeRate;
    s.policyBalance = futureValue(s.policyBalance + premium - setupFee, monthlyRate, 1);
    const balanceFee = s.policyBalance * plan.balanceFeeRate;
    s.policyBalance -= balanceFee;

    s.contributions += premium;
    s.contributionBase += premium;
    s.fees += setupFee + balanceFee;
  };

  const accumulateVehicle = (): void => {
    if (!vehicle) throw new Error("Switched phase without a vehicle");
    const premium = plan.monthlyPremium;
    const growth = (s.vehicleBalance * vehicle.annualReturn) / 12;
    const expense = (s.vehicleBalance * vehicle.annualFee) / 12;
    const switchFee = premium * switchFeeRate;
    s.vehicleBalance += growth - expense + premium - switchFee;
    s.vehicleBasis += premium;

    s.contributions += premium;
    s.fees += expense + switchFee;
    s.withdrawalFees += switchFee;
  };

  const recordYear = (): void => {
    yearRows.push({
      year: s.month / 12,
      phase: s.phase,
      policyBalance: s.policyBalance,
      reinvestmentBalance: s.reinvestmentBalance,
      vehicleBalance: s.vehicleBalance,
      contributions: s.contributions,
      fees: s.fees,
      taxSavings: s.taxSavings,
      withdrawnAmount: s.withdrawnAmount,
      oneTimeTax: s.oneTimeTax,
    });
  };

  const advanceMonth = (): void => {
    if (s.phase === "TERMINAL") {
      throw new Error("Simulation has already been closed out");
    }
    if (s.month >= horizonMonths) {
      throw new Error(`Cannot advance past the ${plan.periodYears}-year horizon`);
    }
    s.month += 1;

    s.reinvestmentBalance = futureValue(s.reinvestmentBalance, reinvestment.annualReturn / 12, 1);

    if (s.phase === "ACCUMULATING") {
      accumulatePolicy();
    } else {
      accumulateVehicle();
    }

    if (s.month % 12 === 0) {
      if (s.phase === "ACCUMULATING") s.taxSavings += annualTaxSavings;
      recordYear();
    }
  };

  return {
    plan,
    get state(): Readonly<SimulationState> {
      return { ...s };
    },
    get phase(): SimulationPhase {
      return s.phase;
    },
    get month(): number {
      return s.month;
    },
    get remainingMonths(): number {
      return horizonMonths - s.month;
    },

    advanceMonth,

    advanceTo(month: number): void {
      if (month < s.month || month > horizonMonths) {
        throw new Error(`Month ${month} is outside ${s.month}..${horizonMonths}`);
      }
      while (s.month < month) advanceMonth();
    },

    partialWithdrawal(ratio: number): WithdrawalEvent {
      assertPhase("ACCUMULATING", "make a partial withdrawal");
      if (!(ratio > 0 && ratio <= 1)) {
        throw invalidInput("INVALID_RATIO", `Withdrawal ratio must be in (0, 1] (got ${ratio})`);
      }
      const amount = s.policyBalance * ratio;
      const fee = amount * plan.withdrawalFeeRate;
      const basis = s.contributionBase * ratio;
      const tax = taxEngine.oneTimeWithdrawalTax(amount - fee - basis);
      const netProceeds = amount - fee - tax;

      s.policyBalance -= amount;
      s.contributionBase -= basis;
      s.reinvestmentBalance += netProceeds;
      s.reinvestmentBasis += netProceeds;
      s.withdrawnAmount += amount;
      s.withdrawalFees += fee;
      s.fees += fee;
      s.oneTimeTax += tax;

      const event: WithdrawalEvent = {
        type: "WITHDRAWAL",
        month: s.month,
        ratio,
        amount,
        fee,
        basis,
        tax,
        netProceeds,
      };
      events.push(event);
      return event;
    },

    switchToVehicle(target: AlternativeVehicle, feeRate: number): SwitchEvent | null {
      assertPhase("ACCUMULATING", "switch");
      if (!(feeRate >= 0 && feeRate < 1)) {
        throw invalidInput("INVALID_FEE_RATE", `Switch fee rate must be in [0, 1) (got ${feeRate})`);
      }
      if (target.annualReturn < -1) {
        throw invalidInput("INVALID_GROWTH_RATE", "Vehicle return cannot be below -100% per year");
      }
      if (horizonMonths - s.month <= 0) return null;

      const liquidation = liquidatePolicy();
      const afterTax = liquidation.proceeds - liquidation.tax;
      const switchFee = afterTax * feeRate;
      const invested = afterTax - switchFee;

      s.withdrawnAmount += s.policyBalance;
      s.withdrawalFees += liquidation.surrenderDeduction + switchFee;
      s.fees += liquidation.surrenderDeduction + switchFee;
      s.oneTimeTax += liquidation.tax;
      s.policyBalance = 0;
      s.contributionBase = 0;
      s.vehicleBalance = invested;
      s.vehicleBasis = afterTax;
      s.phase = "SWITCHED";
      vehicle = target;
      switchFeeRate = feeRate;

      const event: SwitchEvent = {
        type: "SWITCH",
        month: s.month,
        surrenderDeduction: liquidation.surrenderDeduction,
        tax: liquidation.tax,
        switchFee,
        invested,
      };
      events.push(event);
      return event;
    },

    previewLiquidation: liquidatePolicy,

    finish(): SimulationSummary {
      if (s.phase === "TERMINAL") {
        throw new Error("Simulation has already been closed out");
      }
      const terminalValue = s.policyBalance + s.reinvestmentBalance + s.vehicleBalance;
      let closingFees = 0;
      let closingTax = 0;

      if (s.phase === "ACCUMULATING") {
        const liquidation = liquidatePolicy();
        closingFees += liquidation.surrenderDeduction;
        closingTax += liquidation.tax;
        s.oneTimeTax += liquidation.tax;
        s.withdrawnAmount += s.policyBalance;
      }

      const reinvestmentTax = saleTax(
        s.reinvestmentBalance,
        s.reinvestmentBasis,
        reinvestment.capitalGainsTaxRate,
        reinvestment.taxExempt
      );
      const vehicleTax = vehicle
        ? saleTax(s.vehicleBalance, s.vehicleBasis, vehicle.capitalGainsTaxRate, vehicle.taxExempt)
        : 0;
      closingTax += reinvestmentTax + vehicleTax;
      s.saleTax += reinvestmentTax + vehicleTax;

      s.withdrawalFees += closingFees;
      s.fees += closingFees;
      s.phase = "TERMINAL";

      return {
        state: { ...s },
        terminalValue,
        closingFees,
        closingTax,
        netBenefit: terminalValue + s.taxSavings - s.contributions - closingFees - closingTax,
        events: [...events],
        yearRows: [...yearRows],
      };
    },
  };
}
