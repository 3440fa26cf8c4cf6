import { describe, it, expect } from "vitest";
import { createCashflowSimulator, surrenderDeductionRate } from "./simulator";
import { createTaxEngine } from "./tax";
import { InvalidInputError } from "./errors";
import { createBasePlan, createFlatPlan } from "@/fixtures/comparison-scenarios";
import type { AlternativeVehicle } from "@/lib/types/zod";

const noIncome = createTaxEngine({ taxableIncome: 0 });
const highIncome = createTaxEngine({ taxableIncome: 6_000_000 });

const flatVehicle: AlternativeVehicle = {
  annualReturn: 0,
  annualFee: 0,
  capitalGainsTaxRate: 0.2,
  taxExempt: false,
};

describe("surrenderDeductionRate", () => {
  it("falls by one point a year to zero", () => {
    expect(surrenderDeductionRate(0)).toBe(0.1);
    expect(surrenderDeductionRate(3)).toBe(0.07);
    expect(surrenderDeductionRate(10)).toBe(0);
    expect(surrenderDeductionRate(15)).toBe(0);
  });
});

describe("CashflowSimulator", () => {
  it("sums premiums exactly with no growth and no fees", () => {
    const sim = createCashflowSimulator(createFlatPlan(), noIncome);
    sim.advanceTo(120);
    expect(sim.state.policyBalance).toBe(1_200_000);
    expect(sim.state.contributions).toBe(1_200_000);
    expect(sim.remainingMonths).toBe(0);

    const summary = sim.finish();
    expect(summary.yearRows).toHaveLength(10);
    expect(summary.closingFees).toBe(0);
    expect(summary.closingTax).toBe(0);
    expect(summary.netBenefit).toBe(0);
    expect(summary.state.phase).toBe("TERMINAL");
  });

  it("deducts the setup fee from every premium", () => {
    const sim = createCashflowSimulator(createFlatPlan({ setupFeeRate: 0.013 }), noIncome);
    sim.advanceTo(120);
    expect(sim.state.policyBalance).toBeCloseTo(120 * 9_870, 4);
    expect(sim.state.fees).toBeCloseTo(120 * 130, 4);
  });

  it("grows the balance then charges the balance fee", () => {
    const plan = createFlatPlan({ annualGrowthRate: 0.12, balanceFeeRate: 0.001 });
    const sim = createCashflowSimulator(plan, noIncome);
    sim.advanceMonth();
    // (0 + 10,000) × 1.01 = 10,100, less 0.1%
    expect(sim.state.policyBalance).toBeCloseTo(10_089.9, 8);
    expect(sim.state.fees).toBeCloseTo(10.1, 8);
  });

  it("accrues tax savings once per completed policy year", () => {
    const sim = createCashflowSimulator(createBasePlan(), highIncome);
    sim.advanceTo(11);
    expect(sim.state.taxSavings).toBe(0);
    sim.advanceMonth();
    expect(sim.state.taxSavings).toBeCloseTo(15_210, 4);
    sim.advanceTo(24);
    expect(sim.state.taxSavings).toBeCloseTo(30_420, 4);
  });

  it("moves a partial withdrawal into the reinvestment balance", () => {
    const plan = createFlatPlan({ withdrawalFeeRate: 0.01 });
    const sim = createCashflowSimulator(plan, noIncome);
    sim.advanceTo(24);
    const event = sim.partialWithdrawal(0.5);

    expect(event.amount).toBe(120_000);
    expect(event.fee).toBe(1_200);
    expect(event.basis).toBe(120_000);
    expect(event.tax).toBe(0);
    expect(event.netProceeds).toBe(118_800);

    const state = sim.state;
    expect(state.policyBalance).toBe(120_000);
    expect(state.contributionBase).toBe(120_000);
    expect(state.reinvestmentBalance).toBe(118_800);
    expect(state.withdrawnAmount).toBe(120_000);
    expect(state.withdrawalFees).toBe(1_200);
  });

  it("grows the reinvestment balance at its own monthly rate", () => {
    const plan = createFlatPlan({ withdrawalFeeRate: 0.01 });
    const sim = createCashflowSimulator(plan, noIncome, {
      reinvestment: { annualReturn: 0.12 },
    });
    sim.advanceTo(24);
    sim.partialWithdrawal(0.5);
    sim.advanceMonth();
    expect(sim.state.reinvestmentBalance).toBeCloseTo(119_988, 6);
  });

  it("taxes reinvestment gains on close-out", () => {
    const sim = createCashflowSimulator(createFlatPlan(), noIncome, {
      reinvestment: { annualReturn: 0.12, capitalGainsTaxRate: 0.2 },
    });
    sim.advanceTo(108);
    sim.partialWithdrawal(1);
    sim.advanceMonth();
    // 1,080,000 × 1.01 on the deposit; the gain is 10,800.
    const summary = sim.finish();
    expect(summary.state.reinvestmentBalance).toBeCloseTo(1_090_800, 6);
    expect(summary.closingTax).toBeCloseTo(2_160, 6);
  });

  it("switches into the vehicle and charges the fee on later premiums", () => {
    const sim = createCashflowSimulator(createFlatPlan(), noIncome);
    sim.advanceTo(60);
    const event = sim.switchToVehicle(flatVehicle, 0.02);

    expect(event).not.toBeNull();
    expect(event?.surrenderDeduction).toBeCloseTo(30_000, 6);
    expect(event?.tax).toBe(0);
    expect(event?.switchFee).toBeCloseTo(11_400, 6);
    expect(event?.invested).toBeCloseTo(558_600, 6);
    expect(sim.phase).toBe("SWITCHED");

    sim.advanceTo(120);
    const summary = sim.finish();
    expect(summary.state.policyBalance).toBe(0);
    expect(summary.terminalValue).toBeCloseTo(1_146_600, 6);
    expect(summary.state.withdrawalFees).toBeCloseTo(53_400, 6);
    expect(summary.closingTax).toBe(0);
    expect(summary.netBenefit).toBeCloseTo(-53_400, 6);
  });

  it("does not accrue tax savings after a switch", () => {
    const sim = createCashflowSimulator(createBasePlan(), highIncome);
    sim.advanceTo(12);
    sim.switchToVehicle({ ...flatVehicle, annualReturn: 0.0125 }, 0);
    sim.advanceTo(24);
    expect(sim.state.taxSavings).toBeCloseTo(15_210, 4);
  });

  it("leaves liquidation to close-out when no months remain", () => {
    const sim = createCashflowSimulator(createFlatPlan(), noIncome);
    sim.advanceTo(120);
    expect(sim.switchToVehicle(flatVehicle, 0.02)).toBeNull();
    expect(sim.phase).toBe("ACCUMULATING");
    expect(sim.finish().events).toHaveLength(0);
  });

  it("holds the net-benefit identity", () => {
    const sim = createCashflowSimulator(createBasePlan(), highIncome);
    sim.advanceTo(60);
    sim.partialWithdrawal(0.3);
    sim.advanceTo(240);
    const summary = sim.finish();
    const { state } = summary;
    expect(summary.netBenefit).toBeCloseTo(
      summary.terminalValue +
        state.taxSavings -
        state.contributions -
        summary.closingFees -
        summary.closingTax,
      6
    );
    expect(state.contributions).toBe(240 * 9_000);
  });

  it("rejects ratios outside (0, 1]", () => {
    const sim = createCashflowSimulator(createFlatPlan(), noIncome);
    sim.advanceTo(12);
    expect(() => sim.partialWithdrawal(0)).toThrow(InvalidInputError);
    expect(() => sim.partialWithdrawal(1.5)).toThrow(InvalidInputError);
  });

  it("rejects growth below -100% per year", () => {
    expect(() =>
      createCashflowSimulator(createFlatPlan({ annualGrowthRate: -1.5 }), noIncome)
    ).toThrow(InvalidInputError);
  });

  it("rejects fee rates of 1 or more and periods that are not whole years", () => {
    const cases = [
      { setupFeeRate: 1.5 },
      { balanceFeeRate: 1 },
      { withdrawalFeeRate: -0.01 },
      { periodYears: 2.5 },
      { periodYears: 0 },
      { monthlyPremium: -9_000 },
    ];
    for (const overrides of cases) {
      expect(() => createCashflowSimulator(createBasePlan(overrides), highIncome)).toThrow(
        InvalidInputError
      );
    }
  });

  it("reports plan issues with the field path", () => {
    try {
      createCashflowSimulator(createBasePlan({ setupFeeRate: 1.5, periodYears: 2.5 }), highIncome);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (!(error instanceof InvalidInputError)) return;
      expect(error.issues.map((i) => i.path)).toEqual(["periodYears", "setupFeeRate"]);
      expect(error.issues.map((i) => i.code)).toEqual(["PLAN_INVALID_TYPE", "PLAN_TOO_BIG"]);
    }
  });

  it("fills omitted fee rates with the defaults", () => {
    const sim = createCashflowSimulator(
      { monthlyPremium: 10_000, annualGrowthRate: 0, periodYears: 1 },
      noIncome
    );
    expect(sim.plan.setupFeeRate).toBe(0.013);
    sim.advanceMonth();
    expect(sim.state.fees).toBeCloseTo(130 + 9_870 * 0.00008, 8);
  });

  it("refuses to run past the horizon or after close-out", () => {
    const sim = createCashflowSimulator(createFlatPlan({ periodYears: 1 }), noIncome);
    sim.advanceTo(12);
    expect(() => sim.advanceMonth()).toThrow("horizon");
    sim.finish();
    expect(() => sim.finish()).toThrow("closed out");
  });

  it("refuses a partial withdrawal after a switch", () => {
    const sim = createCashflowSimulator(createFlatPlan(), noIncome);
    sim.advanceTo(12);
    sim.switchToVehicle(flatVehicle, 0);
    expect(() => sim.partialWithdrawal(0.5)).toThrow("switched");
  });
});
