/**
 * Default constants for the policy strategy model.
 * Rates are decimals unless noted.
 */

/** Setup fee charged on every monthly premium. Default 1.3%. */
export const DEFAULT_SETUP_FEE_RATE = 0.013;

/** Fee charged on the policy balance each month. Default 0.008%/month. */
export const DEFAULT_BALANCE_FEE_RATE = 0.00008;

/** Fee charged on the gross amount of a partial withdrawal. Default 1%. */
export const DEFAULT_WITHDRAWAL_FEE_RATE = 0.01;

/** Flat resident tax rate applied to the deduction. */
export const DEFAULT_RESIDENT_TAX_RATE = 0.1;

/** Taxable income used when a request leaves it out. */
export const DEFAULT_TAXABLE_INCOME = 5_000_000;

/** Upper bound of the premium deduction, whatever the premium. */
export const DEDUCTION_CAP = 50_000;

/** Special allowance subtracted from a lump-sum profit before it is taxed. */
export const ONE_TIME_INCOME_ALLOWANCE = 500_000;

/** Share of the lump-sum profit (after the allowance) that is added to taxable income. */
export const ONE_TIME_INCOME_INCLUSION_RATE = 0.5;

/** Surrender deduction in the first policy year; falls by SURRENDER_DEDUCTION_STEP each year. */
export const SURRENDER_DEDUCTION_INITIAL_RATE = 0.1;
export const SURRENDER_DEDUCTION_STEP = 0.01;

/** Return of the account that receives partial-withdrawal proceeds (bank deposit). Default 1%. */
export const DEFAULT_REINVESTMENT_RETURN = 0.01;

/** Capital gains tax on the sale of a reinvestment or alternative vehicle. 20.315%. */
export const DEFAULT_CAPITAL_GAINS_TAX_RATE = 0.20315;

/** Horizon cap for the break-even analysis, in years. */
export const MAX_BREAK_EVEN_YEARS = 30;

/** Descriptor count above which validation warns about the search size. */
export const LARGE_SEARCH_SPACE_THRESHOLD = 10_000;

/** Annual premium at which the deduction stops growing. */
export const DEDUCTION_SATURATION_PREMIUM = 100_000;

/**
 * Income tax table including the 2.1% reconstruction surtax.
 * quickDeduction is the published quick-calculation amount for each bracket.
 */
export const DEFAULT_INCOME_TAX_BRACKETS = [
  { threshold: 1_950_000, rate: 0.0515, quickDeduction: 0 },
  { threshold: 3_300_000, rate: 0.1021, quickDeduction: 97_500 },
  { threshold: 6_950_000, rate: 0.2042, quickDeduction: 427_500 },
  { threshold: 9_000_000, rate: 0.2353, quickDeduction: 636_000 },
  { threshold: 18_000_000, rate: 0.3372, quickDeduction: 1_536_000 },
  { threshold: 40_000_000, rate: 0.4084, quickDeduction: 2_796_000 },
  { threshold: null, rate: 0.4599, quickDeduction: 4_796_000 },
] as const;

/** Withdrawal years reported after a deduction reform. */
export const DEFAULT_YEARS_AFTER_REFORM = 5;

/** Granularity of premium splits across contracts, in yen. */
export const PREMIUM_ALLOCATION_STEP = 1_000;
