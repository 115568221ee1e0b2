/**
 * Round-up savings pipeline.
 * enrich -> validate/dedupe -> override + bonus -> aggregate per evaluation period -> project.
 */

import type {
  BonusPeriod,
  EnrichedTransaction,
  EnrichedTransactionRecord,
  EvaluationPeriod,
  FilterReport,
  OverridePeriod,
  PeriodSavings,
  ReturnsPreset,
  ReturnsRequest,
  ReturnsResult,
  Transaction,
  ValidationReport,
} from "@/lib/types/zod";
import { enrichTransactions, toEnrichedRecord } from "@/lib/model/enrichment";
import { validateTransactions } from "@/lib/model/validation";
import {
  adjustRemnant,
  inEvaluationPeriod,
  isWithinPeriod,
} from "@/lib/model/periods";
import {
  RETURNS_PRESETS,
  inflationToDecimal,
  investmentHorizonYears,
  projectedProfit,
  type ReturnsPresetConfig,
} from "@/lib/model/returns";
import { taxBenefit } from "@/lib/model/tax";
import {
  resolveLogger,
  type EngineLogger,
  type EngineOptions,
} from "@/lib/observability/logger";
import { formatTimestamp } from "@/lib/utils/datetime";
import { roundMoney } from "@/lib/utils/format";

/** Valid transaction after override and bonus rules. */
export interface AdjustedTransaction extends EnrichedTransaction {
  baseRemnant: number;
}

export interface AdjustedLedger {
  /** Transactions whose adjusted remnant is > 0, in input order. */
  investable: AdjustedTransaction[];
  /** Sum of raw amounts across all valid transactions. */
  totalAmount: number;
  /** Sum of ceilings across all valid transactions. */
  totalCeiling: number;
}

/** Enrich transactions for output (parse endpoint). */
export function parseTransactions(
  transactions: Transaction[],
  options?: EngineOptions
): EnrichedTransactionRecord[] {
  return enrichTransactions(transactions, options).map(toEnrichedRecord);
}

/**
 * Validate caller-supplied enriched transactions; invalid ones are reported with messages.
 * Duplicates are keyed on the parsed instant, so "2024-01-15" and "2024-01-15 00:00:00"
 * collide, and every date is echoed back in the boundary format.
 */
export function validateEnrichedTransactions(
  transactions: EnrichedTransaction[],
  options?: EngineOptions
): ValidationReport {
  const { valid, invalid } = validateTransactions(transactions, new Set(), options);
  return {
    valid: valid.map(toEnrichedRecord),
    invalid: invalid.map((t) => ({ ...toEnrichedRecord(t), message: t.message })),
  };
}

/**
 * Enrich, validate and apply period rules, reporting invalid transactions.
 * Entries whose adjusted remnant is not positive are left out of `valid`
 * without being reported as invalid. `inKPeriod` flags evaluation membership;
 * it does not filter.
 */
export function filterByPeriods(
  transactions: Transaction[],
  overridePeriods: OverridePeriod[] = [],
  bonusPeriods: BonusPeriod[] = [],
  evaluationPeriods: EvaluationPeriod[] = [],
  options?: EngineOptions
): FilterReport {
  const enriched = enrichTransactions(transactions, options);
  const { valid, invalid } = validateTransactions(enriched, new Set(), options);

  const report: FilterReport = {
    valid: [],
    invalid: invalid.map((t) => ({
      date: formatTimestamp(t.date),
      amount: t.amount,
      message: t.message,
    })),
  };

  for (const t of valid) {
    const remnant = adjustRemnant(t.date, t.remnant, overridePeriods, bonusPeriods, options);
    if (remnant <= 0) continue;
    report.valid.push({
      ...toEnrichedRecord(t),
      remnant,
      inKPeriod: inEvaluationPeriod(t.date, evaluationPeriods),
    });
  }

  return report;
}

/** Validate for the returns pipelines: invalid transactions are logged and dropped. */
function dropInvalid(
  enriched: EnrichedTransaction[],
  logger: EngineLogger
): EnrichedTransaction[] {
  const { valid, invalid } = validateTransactions(enriched, new Set(), { logger });
  for (const t of invalid) {
    logger.warn(
      { date: formatTimestamp(t.date), amount: t.amount, message: t.message },
      "Skipping invalid transaction"
    );
  }
  logger.info(
    { valid: valid.length, total: enriched.length },
    "Valid transactions after validation"
  );
  return valid;
}

/** Apply override and bonus rules; totals cover every valid transaction. */
export function adjustTransactions(
  transactions: EnrichedTransaction[],
  overridePeriods: OverridePeriod[],
  bonusPeriods: BonusPeriod[],
  options?: EngineOptions
): AdjustedLedger {
  const logger = resolveLogger(options);
  const ledger: AdjustedLedger = { investable: [], totalAmount: 0, totalCeiling: 0 };

  for (const t of transactions) {
    const remnant = adjustRemnant(t.date, t.remnant, overridePeriods, bonusPeriods, options);
    ledger.totalAmount += t.amount;
    ledger.totalCeiling += t.ceiling;

    if (remnant > 0) {
      ledger.investable.push({ ...t, baseRemnant: t.remnant, remnant });
    } else {
      logger.debug(
        { date: formatTimestamp(t.date), remnant },
        "Skipped transaction with non-positive remnant"
      );
    }
  }

  logger.info(
    {
      investable: ledger.investable.length,
      totalAmount: ledger.totalAmount,
      totalCeiling: ledger.totalCeiling,
    },
    "Applied period rules"
  );
  return ledger;
}

/** Sum of adjusted remnants inside one evaluation period. */
export function periodInvestment(
  period: EvaluationPeriod,
  investable: AdjustedTransaction[]
): number {
  let sum = 0;
  for (const t of investable) {
    if (isWithinPeriod(t.date, period)) sum += t.remnant;
  }
  return sum;
}

interface ProjectionContext {
  years: number;
  inflation: number;
  annualIncome: number;
  preset: ReturnsPresetConfig;
}

function summarizePeriod(
  period: EvaluationPeriod,
  investable: AdjustedTransaction[],
  ctx: ProjectionContext,
  logger: EngineLogger
): PeriodSavings {
  const invested = periodInvestment(period, investable);
  const profit = projectedProfit(invested, ctx.years, ctx.preset.annualRate, ctx.inflation);
  const benefit = ctx.preset.includeTaxBenefit ? taxBenefit(invested, ctx.annualIncome) : 0;

  logger.info(
    {
      start: formatTimestamp(period.start),
      end: formatTimestamp(period.end),
      invested,
      years: ctx.years,
      profit,
      taxBenefit: benefit,
    },
    "Projected evaluation period"
  );

  return {
    start: formatTimestamp(period.start),
    end: formatTimestamp(period.end),
    amount: roundMoney(invested),
    profits: roundMoney(profit),
    taxBenefit: roundMoney(benefit),
  };
}

/**
 * Project returns per evaluation period for a preset.
 * Results follow the order of `request.k`.
 */
export function projectReturns(
  request: ReturnsRequest,
  preset: ReturnsPreset,
  options?: EngineOptions
): ReturnsResult {
  const logger = resolveLogger(options);
  const presetConfig = RETURNS_PRESETS[preset];
  logger.info(
    {
      preset,
      age: request.age,
      wage: request.wage,
      inflation: request.inflation,
      transactions: request.transactions.length,
      q: request.q.length,
      p: request.p.length,
      k: request.k.length,
    },
    "Calculating returns"
  );

  const enriched = enrichTransactions(request.transactions, { logger });
  const valid = dropInvalid(enriched, logger);
  const ledger = adjustTransactions(valid, request.q, request.p, { logger });

  const ctx: ProjectionContext = {
    years: investmentHorizonYears(request.age),
    inflation: inflationToDecimal(request.inflation),
    annualIncome: request.wage * 12,
    preset: presetConfig,
  };

  return {
    totalTransactionAmount: roundMoney(ledger.totalAmount),
    totalCeiling: roundMoney(ledger.totalCeiling),
    savingsByDates: request.k.map((period) =>
      summarizePeriod(period, ledger.investable, ctx, logger)
    ),
  };
}

/** NPS-style projection: 7.11% with tax benefit. */
export function calculateNpsReturns(
  request: ReturnsRequest,
  options?: EngineOptions
): ReturnsResult {
  return projectReturns(request, "NPS", options);
}

/** Index-fund projection: 14.49%, no tax benefit. */
export function calculateIndexReturns(
  request: ReturnsRequest,
  options?: EngineOptions
): ReturnsResult {
  return projectReturns(request, "INDEX", options);
}
