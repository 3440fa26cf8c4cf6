import { describe, it, expect } from "vitest";
import { calculateDeduction, createTaxEngine, resolveBrackets } from "./tax";
import { InvalidInputError } from "./errors";
import { DEDUCTION_CAP } from "./constants";

describe("calculateDeduction", () => {
  it("follows the piecewise table at each boundary", () => {
    expect(calculateDeduction(0)).toBe(0);
    expect(calculateDeduction(25_000)).toBe(12_500);
    expect(calculateDeduction(25_001)).toBeCloseTo(18_750.25, 6);
    expect(calculateDeduction(50_000)).toBe(25_000);
    expect(calculateDeduction(50_001)).toBeCloseTo(25_000.2, 6);
    expect(calculateDeduction(100_000)).toBe(35_000);
    expect(calculateDeduction(100_001)).toBe(50_000);
  });

  it("is monotone and never exceeds the cap", () => {
    let previous = 0;
    for (let premium = 0; premium <= 300_000; premium += 2_500) {
      const deduction = calculateDeduction(premium);
      expect(deduction).toBeGreaterThanOrEqual(previous);
      expect(deduction).toBeLessThanOrEqual(DEDUCTION_CAP);
      previous = deduction;
    }
  });

  it("rejects a negative premium", () => {
    expect(() => calculateDeduction(-1)).toThrow(InvalidInputError);
    try {
      calculateDeduction(-1);
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (error instanceof InvalidInputError) {
        expect(error.issues[0]?.code).toBe("NEGATIVE_PREMIUM");
      }
    }
  });
});

describe("createTaxEngine", () => {
  const engine = createTaxEngine({ taxableIncome: 6_000_000 });

  it("fills in the default table and resident tax rate", () => {
    expect(engine.context.residentTaxRate).toBe(0.1);
    expect(engine.brackets).toHaveLength(7);
    expect(engine.brackets[2]).toEqual({ threshold: 6_950_000, rate: 0.2042, quickDeduction: 427_500 });
  });

  it("computes progressive income tax with quick deductions", () => {
    expect(engine.progressiveIncomeTax(0)).toBe(0);
    expect(engine.progressiveIncomeTax(-100)).toBe(0);
    expect(engine.progressiveIncomeTax(1_950_000)).toBeCloseTo(100_425, 4);
    expect(engine.progressiveIncomeTax(6_000_000)).toBeCloseTo(797_700, 4);
    expect(engine.progressiveIncomeTax(50_000_000)).toBeCloseTo(18_199_000, 2);
  });

  it("reports the marginal rate of the bracket", () => {
    expect(engine.marginalRate(0)).toBe(0);
    expect(engine.marginalRate(1_000_000)).toBe(0.0515);
    expect(engine.marginalRate(6_000_000)).toBe(0.2042);
    expect(engine.marginalRate(100_000_000)).toBe(0.4599);
  });

  it("computes annual tax savings for a capped premium", () => {
    const savings = engine.annualTaxSavings(108_000);
    expect(savings.deduction).toBe(50_000);
    expect(savings.incomeTaxSavings).toBeCloseTo(10_210, 4);
    expect(savings.residentTaxSavings).toBe(5_000);
    expect(savings.total).toBeCloseTo(15_210, 4);
  });

  it("limits resident savings to the income when the deduction exceeds it", () => {
    const savings = engine.taxSavings(50_000, 30_000);
    expect(savings.incomeTaxSavings).toBeCloseTo(1_545, 6);
    expect(savings.residentTaxSavings).toBe(3_000);
  });

  it("returns zero savings without income", () => {
    expect(engine.taxSavings(50_000, 0)).toEqual({
      incomeTaxSavings: 0,
      residentTaxSavings: 0,
      total: 0,
    });
  });

  it("taxes half the profit above the allowance at the marginal rate", () => {
    const lower = createTaxEngine({ taxableIncome: 5_000_000 });
    expect(lower.oneTimeWithdrawalTax(800_000)).toBeCloseTo(30_630, 4);
  });

  it("does not tax a profit within the allowance or a loss", () => {
    expect(engine.oneTimeWithdrawalTax(500_000)).toBe(0);
    expect(engine.oneTimeWithdrawalTax(-20_000)).toBe(0);
  });

  it("describes the deduction bracket", () => {
    const middle = engine.deductionBreakdown(30_000);
    expect(middle.bracketIndex).toBe(1);
    expect(middle.deduction).toBe(20_000);
    expect(middle.effectiveRate).toBeCloseTo(2 / 3, 10);
    expect(middle.capReached).toBe(false);

    const capped = engine.deductionBreakdown(120_000);
    expect(capped.bracketIndex).toBe(3);
    expect(capped.capReached).toBe(true);

    expect(engine.deductionBreakdown(0).effectiveRate).toBe(0);
  });

  it("derives missing quick deductions so the curve is continuous", () => {
    const custom = createTaxEngine({
      taxableIncome: 2_000,
      brackets: [
        { threshold: 1_000, rate: 0.1 },
        { threshold: null, rate: 0.2 },
      ],
      residentTaxRate: 0,
    });
    expect(custom.brackets[1]?.quickDeduction).toBeCloseTo(100, 10);
    expect(custom.progressiveIncomeTax(2_000)).toBeCloseTo(300, 10);
    expect(custom.progressiveIncomeTax(1_000)).toBeCloseTo(100, 10);
  });

  it("rejects a negative income", () => {
    expect(() => createTaxEngine({ taxableIncome: -1 })).toThrow(InvalidInputError);
  });

  it("rejects a bracket table without an unbounded top bracket", () => {
    expect(() =>
      createTaxEngine({
        taxableIncome: 1_000,
        brackets: [{ threshold: 1_000, rate: 0.1 }],
      })
    ).toThrow(InvalidInputError);
  });

  it("rejects thresholds that do not increase", () => {
    expect(() =>
      createTaxEngine({
        taxableIncome: 1_000,
        brackets: [
          { threshold: 2_000, rate: 0.1 },
          { threshold: 1_000, rate: 0.2 },
          { threshold: null, rate: 0.3 },
        ],
      })
    ).toThrow(InvalidInputError);
  });
});

describe("resolveBrackets", () => {
  it("keeps explicit quick deductions", () => {
    const resolved = resolveBrackets([
      { threshold: 1_000, rate: 0.1, quickDeduction: 0 },
      { threshold: null, rate: 0.2, quickDeduction: 150 },
    ]);
    expect(resolved[1]?.quickDeduction).toBe(150);
  });
});
