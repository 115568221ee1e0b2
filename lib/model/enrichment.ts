/**
 * Round-up enrichment: ceiling and remnant per transaction.
 */

import type {
  EnrichedTransaction,
  EnrichedTransactionRecord,
  Transaction,
} from "@/lib/types/zod";
import { ROUNDING_BASE } from "@/lib/model/constants";
import { resolveLogger, type EngineOptions } from "@/lib/observability/logger";
import { formatTimestamp } from "@/lib/utils/datetime";

/** Next multiple of ROUNDING_BASE at or above amount. */
export function ceilingOf(amount: number): number {
  return Math.ceil(amount / ROUNDING_BASE) * ROUNDING_BASE;
}

export function enrichTransaction(transaction: Transaction): EnrichedTransaction {
  const ceiling = ceilingOf(transaction.amount);
  return {
    date: transaction.date,
    amount: transaction.amount,
    ceiling,
    remnant: ceiling - transaction.amount,
  };
}

export function enrichTransactions(
  transactions: Transaction[],
  options?: EngineOptions
): EnrichedTransaction[] {
  const logger = resolveLogger(options);
  logger.info({ count: transactions.length }, "Enriching transactions");

  const enriched = transactions.map((t) => {
    const e = enrichTransaction(t);
    logger.debug(
      { date: formatTimestamp(e.date), amount: e.amount, ceiling: e.ceiling, remnant: e.remnant },
      "Enriched transaction"
    );
    return e;
  });

  logger.info({ count: enriched.length }, "Enriched transactions");
  return enriched;
}

export function toEnrichedRecord(transaction: EnrichedTransaction): EnrichedTransactionRecord {
  return {
    date: formatTimestamp(transaction.date),
    amount: transaction.amount,
    ceiling: transaction.ceiling,
    remnant: transaction.remnant,
  };
}
