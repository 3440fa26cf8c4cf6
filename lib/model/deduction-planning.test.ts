import { describe, it, expect } from "vitest";
import { deductionForContracts, optimizePremiumDistribution } from "./deduction-planning";
import { InvalidInputError } from "./errors";

describe("deductionForContracts", () => {
  it("prefers claiming small contracts one by one", () => {
    expect(deductionForContracts([30_000, 30_000])).toEqual({
      contractCount: 2,
      totalPremium: 60_000,
      individualTotal: 40_000,
      combinedDeduction: 27_000,
      bestDeduction: 40_000,
      individualIsBetter: true,
      difference: 13_000,
    });
  });

  it("reaches the cap either way for large premiums", () => {
    const result = deductionForContracts([150_000]);
    expect(result.individualTotal).toBe(50_000);
    expect(result.combinedDeduction).toBe(50_000);
    expect(result.individualIsBetter).toBe(false);
    expect(result.difference).toBe(0);
  });

  it("is all zeros without contracts", () => {
    const result = deductionForContracts([]);
    expect(result.contractCount).toBe(0);
    expect(result.bestDeduction).toBe(0);
  });

  it("rejects a negative premium", () => {
    expect(() => deductionForContracts([10_000, -1])).toThrow(InvalidInputError);
  });
});

describe("optimizePremiumDistribution", () => {
  it("keeps a single contract whole", () => {
    expect(optimizePremiumDistribution(150_000, 1)).toEqual({
      allocation: [150_000],
      totalDeduction: 50_000,
      totalBudget: 150_000,
      contractCount: 1,
      averageRate: 50_000 / 150_000,
    });
  });

  it("keeps the first of several equally good splits", () => {
    const result = optimizePremiumDistribution(60_000);
    // Any split with both contracts between 25,000 and 35,000 yields 40,000.
    expect(result.allocation).toEqual([26_000, 34_000]);
    expect(result.totalDeduction).toBe(40_000);
  });

  it("fills one contract to the saturation premium and gives the rest to the next", () => {
    const result = optimizePremiumDistribution(200_000);
    expect(result.allocation).toEqual([100_000, 100_000]);
    expect(result.totalDeduction).toBeCloseTo(85_000, 6);
    expect(result.averageRate).toBeCloseTo(0.425, 9);
  });

  it("searches every contract but the last", () => {
    const result = optimizePremiumDistribution(90_000, 3, 5_000);
    expect(result.allocation).toHaveLength(3);
    expect(result.allocation.reduce((a, b) => a + b, 0)).toBe(90_000);
    expect(result.totalDeduction).toBeCloseTo(60_000, 6);
  });

  it("rejects a bad budget or contract count", () => {
    expect(() => optimizePremiumDistribution(-1)).toThrow(InvalidInputError);
    expect(() => optimizePremiumDistribution(100_000, 0)).toThrow(InvalidInputError);
    expect(() => optimizePremiumDistribution(100_000, 2, 0)).toThrow(InvalidInputError);
  });
});
