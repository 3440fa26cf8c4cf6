/**
 * Zod schemas for the policy strategy planner.
 * Every boundary parses through these; inferred types are used everywhere else.
 */

import { z } from "zod";
import {
  DEFAULT_BALANCE_FEE_RATE,
  DEFAULT_CAPITAL_GAINS_TAX_RATE,
  DEFAULT_INCOME_TAX_BRACKETS,
  DEFAULT_REINVESTMENT_RETURN,
  DEFAULT_RESIDENT_TAX_RATE,
  DEFAULT_SETUP_FEE_RATE,
  DEFAULT_WITHDRAWAL_FEE_RATE,
  DEFAULT_YEARS_AFTER_REFORM,
} from "@/lib/model/constants";

/** Fee rates live in [0, 1). */
const feeRate = (label: string) =>
  z
    .number()
    .min(0, { message: `${label} must be at least 0` })
    .lt(1, { message: `${label} must be below 1` });

export const PremiumPlanSchema = z.object({
  monthlyPremium: z.number().positive({ message: "Monthly premium must be positive" }),
  /** Annual growth as decimal, e.g. 0.0125 for 1.25%. Below -100% is rejected. */
  annualGrowthRate: z
    .number()
    .min(-1, { message: "Growth rate cannot be below -100% per year" }),
  periodYears: z
    .number()
    .int({ message: "Period must be a whole number of years" })
    .positive({ message: "Period must be positive" }),
  setupFeeRate: feeRate("Setup fee rate").default(DEFAULT_SETUP_FEE_RATE),
  /** Charged on the balance every month. */
  balanceFeeRate: feeRate("Balance fee rate").default(DEFAULT_BALANCE_FEE_RATE),
  withdrawalFeeRate: feeRate("Withdrawal fee rate").default(DEFAULT_WITHDRAWAL_FEE_RATE),
});
export type PremiumPlan = z.infer<typeof PremiumPlanSchema>;
export type PremiumPlanInput = z.input<typeof PremiumPlanSchema>;

export const TaxBracketSchema = z.object({
  /** Upper bound of the bracket; null marks the unbounded top bracket. */
  threshold: z.number().positive().nullable(),
  rate: z.number().min(0).max(1),
  /** Quick-calculation deduction. Derived from lower brackets when omitted. */
  quickDeduction: z.number().min(0).optional(),
});
export type TaxBracket = z.infer<typeof TaxBracketSchema>;

export const TaxBracketTableSchema = z
  .array(TaxBracketSchema)
  .min(1, { message: "Bracket table needs at least one bracket" })
  .refine((brackets) => brackets[brackets.length - 1]?.threshold === null, {
    message: "Last bracket must be unbounded (threshold null)",
  })
  .refine(
    (brackets) =>
      brackets.every((b, i) => {
        if (i === brackets.length - 1) return true;
        const next = brackets[i + 1];
        return (
          b.threshold !== null &&
          next !== undefined &&
          (next.threshold === null || next.threshold > b.threshold)
        );
      }),
    { message: "Bracket thresholds must be strictly increasing; only the last may be unbounded" }
  );

export const TaxContextSchema = z.object({
  taxableIncome: z.number().min(0, { message: "Taxable income cannot be negative" }),
  brackets: TaxBracketTableSchema.default(
    DEFAULT_INCOME_TAX_BRACKETS.map((b) => ({ ...b }))
  ),
  residentTaxRate: z.number().min(0).max(1).default(DEFAULT_RESIDENT_TAX_RATE),
});
export type TaxContext = z.infer<typeof TaxContextSchema>;
export type TaxContextInput = z.input<typeof TaxContextSchema>;

/** Where partial-withdrawal proceeds are parked. Default: bank deposit at 1%. */
export const ReinvestmentAccountSchema = z.object({
  annualReturn: z.number().min(-1).default(DEFAULT_REINVESTMENT_RETURN),
  capitalGainsTaxRate: z.number().min(0).max(1).default(DEFAULT_CAPITAL_GAINS_TAX_RATE),
  /** When true the gain is not taxed on sale. */
  taxExempt: z.boolean().default(false),
});
export type ReinvestmentAccount = z.infer<typeof ReinvestmentAccountSchema>;

/** Destination of a switch. annualReturn defaults to the policy growth rate (see effective inputs). */
export const AlternativeVehicleSchema = z.object({
  annualReturn: z.number().min(-1),
  /** Yearly expense ratio, deducted from the return. */
  annualFee: z.number().min(0).lt(1).default(0),
  capitalGainsTaxRate: z.number().min(0).max(1).default(DEFAULT_CAPITAL_GAINS_TAX_RATE),
  taxExempt: z.boolean().default(false),
});
export type AlternativeVehicle = z.infer<typeof AlternativeVehicleSchema>;
export type AlternativeVehicleInput = z.input<typeof AlternativeVehicleSchema>;

export const StrategyKindSchema = z.enum(["FULL_WITHDRAWAL", "PARTIAL_WITHDRAWAL", "SWITCH"]);
export type StrategyKind = z.infer<typeof StrategyKindSchema>;

const wholeYear = z
  .number()
  .int({ message: "Years must be whole numbers" })
  .min(1, { message: "Years must be at least 1" });

const withdrawalRatio = z
  .number()
  .gt(0, { message: "Withdrawal ratio must be above 0" })
  .max(1, { message: "Withdrawal ratio cannot exceed 1" });

export const FullWithdrawalSchema = z.object({
  kind: z.literal("FULL_WITHDRAWAL"),
  year: wholeYear,
});

export const PartialWithdrawalSchema = z.object({
  kind: z.literal("PARTIAL_WITHDRAWAL"),
  interval: wholeYear,
  ratio: withdrawalRatio,
});

export const SwitchStrategySchema = z.object({
  kind: z.literal("SWITCH"),
  year: wholeYear,
  feeRate: feeRate("Switch fee rate"),
});

export const StrategyDescriptorSchema = z.discriminatedUnion("kind", [
  FullWithdrawalSchema,
  PartialWithdrawalSchema,
  SwitchStrategySchema,
]);
export type StrategyDescriptor = z.infer<typeof StrategyDescriptorSchema>;
export type FullWithdrawal = z.infer<typeof FullWithdrawalSchema>;
export type PartialWithdrawal = z.infer<typeof PartialWithdrawalSchema>;
export type SwitchStrategy = z.infer<typeof SwitchStrategySchema>;

export const StrategyRangesSchema = z.object({
  withdrawalIntervals: z.array(wholeYear).default([]),
  withdrawalRatios: z.array(withdrawalRatio).default([]),
  fullWithdrawalYears: z.array(wholeYear).default([]),
  switchYears: z.array(wholeYear).default([]),
  switchFeeRates: z.array(feeRate("Switch fee rate")).default([]),
});
export type StrategyRanges = z.infer<typeof StrategyRangesSchema>;
export type StrategyRangesInput = z.input<typeof StrategyRangesSchema>;

/** Deduction limit change taking effect from `reformYear` (a policy year). */
export const TaxReformSchema = z.object({
  reformYear: wholeYear,
  newDeductionLimit: z.number().min(0, { message: "Deduction limit cannot be negative" }),
  /** Withdrawal years to report from the reform year on. */
  yearsAfterReform: wholeYear.default(DEFAULT_YEARS_AFTER_REFORM),
});
export type TaxReform = z.infer<typeof TaxReformSchema>;
export type TaxReformInput = z.input<typeof TaxReformSchema>;

export const ComparisonInputSchema = z.object({
  plan: PremiumPlanSchema,
  tax: TaxContextSchema,
  ranges: StrategyRangesSchema,
  reinvestment: ReinvestmentAccountSchema.default({}),
  vehicle: AlternativeVehicleSchema,
});
export type ComparisonInput = z.infer<typeof ComparisonInputSchema>;

/**
 * Caller-facing request: optional fields resolve to engine defaults
 * through getEffectiveComparisonInput.
 */
export const ComparisonRequestSchema = z.object({
  plan: PremiumPlanSchema,
  tax: TaxContextSchema.partial({ taxableIncome: true }).optional(),
  ranges: StrategyRangesSchema,
  reinvestment: ReinvestmentAccountSchema.partial().optional(),
  vehicle: AlternativeVehicleSchema.partial().optional(),
});
export type ComparisonRequest = z.input<typeof ComparisonRequestSchema>;

export const StrategyBreakdownSchema = z.object({
  /** Balances still held at close-out, before closing fees and taxes. */
  terminalValue: z.number(),
  totalContributions: z.number(),
  /** Setup, balance, withdrawal, surrender and switch fees over the whole run. */
  totalFees: z.number(),
  /** Withdrawal-type fees only: withdrawal fees, surrender deductions, switch fees. */
  withdrawalFees: z.number(),
  /** One-time withdrawal tax plus capital gains tax on sale. */
  totalTax: z.number(),
  taxSavings: z.number(),
  withdrawnAmount: z.number(),
  closingFees: z.number(),
  closingTax: z.number(),
  annualizedReturn: z.number().nullable(),
});
export type StrategyBreakdown = z.infer<typeof StrategyBreakdownSchema>;

export interface StrategyResult {
  readonly descriptor: StrategyDescriptor;
  readonly key: string;
  readonly label: string;
  readonly netBenefit: number;
  readonly breakdown: Readonly<StrategyBreakdown>;
}
