export * from "@/lib/types/zod";
export * from "@/lib/model/constants";
export { InvalidInputError, parseInput } from "@/lib/model/errors";
export type { InputIssue } from "@/lib/model/errors";
export * from "@/lib/model/financial-math";
export { calculateDeduction, createTaxEngine, resolveBrackets } from "@/lib/model/tax";
export type {
  AnnualTaxSavings,
  DeductionBreakdown,
  ResolvedBracket,
  TaxEngine,
  TaxSavings,
} from "@/lib/model/tax";
export {
  createCashflowSimulator,
  parsePremiumPlan,
  surrenderDeductionRate,
} from "@/lib/model/simulator";
export type {
  CashflowSimulator,
  PolicyLiquidation,
  SimulationEvent,
  SimulationPhase,
  SimulationState,
  SimulationSummary,
  SimulationYearRow,
  SimulatorOptions,
  SwitchEvent,
  WithdrawalEvent,
} from "@/lib/model/simulator";
export {
  STRATEGY_KIND_LABELS,
  createStrategyCatalog,
  strategyKey,
  strategyLabel,
  strategyParameters,
} from "@/lib/model/catalog";
export type { CatalogRanges, StrategyCatalog } from "@/lib/model/catalog";
export {
  evaluateStrategy,
  resolveVehicle,
  simulateStrategy,
  yearlyCashFlows,
} from "@/lib/model/evaluator";
export type { EvaluationOptions } from "@/lib/model/evaluator";
export { compareResults, rankStrategies } from "@/lib/model/ranking";
export type { RankingRow, RankingTable } from "@/lib/model/ranking";
export {
  DIRECT_INVESTMENT_KEY,
  compareIncomeScenarios,
  compareStrategies,
  directInvestmentBaseline,
  findBestWithdrawalYear,
} from "@/lib/model/compare";
export type {
  BestWithdrawalYear,
  CompareOptions,
  ComparisonResult,
  DirectInvestmentBaseline,
  IncomeScenario,
  IncomeScenarioResult,
  Recommendation,
} from "@/lib/model/compare";
export { analyzeBreakEven } from "@/lib/model/breakeven";
export type { BreakEvenAnalysis, BreakEvenRow } from "@/lib/model/breakeven";
export { analyzeTaxReformImpact } from "@/lib/model/tax-reform";
export type { TaxReformImpact, TaxReformRow } from "@/lib/model/tax-reform";
export { deductionForContracts, optimizePremiumDistribution } from "@/lib/model/deduction-planning";
export type { ContractDeduction, PremiumDistribution } from "@/lib/model/deduction-planning";
export {
  SCENARIO_PARAMETERS,
  analyzeSensitivity,
  runScenario,
  runScenarioGrid,
} from "@/lib/model/scenarios";
export type {
  ScenarioParameter,
  ScenarioRow,
  ScenarioValues,
  ScenarioVariations,
} from "@/lib/model/scenarios";
export { getEffectiveComparisonInput } from "@/lib/model/effective-inputs";
export { validateComparison } from "@/lib/model/validation";
export type {
  ValidationError,
  ValidationResult,
  ValidationWarning,
} from "@/lib/model/validation";
export { formatCurrency, formatPercent } from "@/lib/utils/format";
