export * from "@/lib/types/zod";
export * from "@/lib/model/constants";
export { ceilingOf, enrichTransaction, enrichTransactions, toEnrichedRecord } from "@/lib/model/enrichment";
export {
  checkTransaction,
  transactionKey,
  validateTransactions,
  type RejectedTransaction,
  type SeenTransactions,
  type ValidationError,
  type ValidationErrorCode,
  type ValidationResult,
} from "@/lib/model/validation";
export {
  adjustRemnant,
  applyBonus,
  applyOverride,
  findOverridePeriod,
  inEvaluationPeriod,
  isWithinPeriod,
} from "@/lib/model/periods";
export { calculateTax, npsDeduction, taxBenefit } from "@/lib/model/tax";
export {
  RETURNS_PRESETS,
  compoundReturn,
  inflationToDecimal,
  investmentHorizonYears,
  projectedProfit,
  type ReturnsPresetConfig,
} from "@/lib/model/returns";
export {
  adjustTransactions,
  calculateIndexReturns,
  calculateNpsReturns,
  filterByPeriods,
  parseTransactions,
  periodInvestment,
  projectReturns,
  validateEnrichedTransactions,
  type AdjustedLedger,
  type AdjustedTransaction,
} from "@/lib/model/engine";
export { createLogger, silentLogger, type EngineLogger, type EngineOptions } from "@/lib/observability/logger";
export { getPerformanceMetrics, type PerformanceMetrics } from "@/lib/observability/metrics";
export { ConfigError, loadConfig, type AppConfig, type LogLevel } from "@/lib/config/env";
export { formatTimestamp, parseTimestamp, TIMESTAMP_FORMAT } from "@/lib/utils/datetime";
export { roundMoney } from "@/lib/utils/format";
export * from "@/lib/api/handlers";
