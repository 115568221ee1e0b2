/**
 * Transaction validation: negative amounts and exact (timestamp, amount) duplicates.
 * Both are per-transaction and non-fatal; an invalid transaction is excluded, never thrown.
 */

import type { Transaction } from "@/lib/types/zod";
import {
  DUPLICATE_TRANSACTION_MESSAGE,
  NEGATIVE_AMOUNT_MESSAGE,
  VALIDATION_MESSAGE_DELIMITER,
} from "@/lib/model/constants";
import { resolveLogger, type EngineOptions } from "@/lib/observability/logger";
import { formatTimestamp } from "@/lib/utils/datetime";

export type ValidationErrorCode = "NEGATIVE_AMOUNT" | "DUPLICATE_TRANSACTION";

export interface ValidationError {
  code: ValidationErrorCode;
  message: string;
}

/** Identity keys of transactions accepted so far in one request. */
export type SeenTransactions = Set<string>;

export type RejectedTransaction<T extends Transaction> = T & {
  errors: ValidationError[];
  message: string;
};

export interface ValidationResult<T extends Transaction> {
  valid: T[];
  invalid: RejectedTransaction<T>[];
  /** Seen set after this batch; pass it on to keep deduplicating in the same request. */
  seen: SeenTransactions;
}

/** Identity key: two transactions with the same instant and amount are duplicates. */
export function transactionKey(transaction: Transaction): string {
  return `${transaction.date.getTime()}|${transaction.amount}`;
}

/** Errors for one transaction, negative-amount check first. Does not modify `seen`. */
export function checkTransaction(
  transaction: Transaction,
  seen: ReadonlySet<string>
): ValidationError[] {
  const errors: ValidationError[] = [];
  if (transaction.amount < 0) {
    errors.push({ code: "NEGATIVE_AMOUNT", message: NEGATIVE_AMOUNT_MESSAGE });
  }
  if (seen.has(transactionKey(transaction))) {
    errors.push({ code: "DUPLICATE_TRANSACTION", message: DUPLICATE_TRANSACTION_MESSAGE });
  }
  return errors;
}

export function joinMessages(errors: ValidationError[]): string {
  return errors.map((e) => e.message).join(VALIDATION_MESSAGE_DELIMITER);
}

/**
 * Split transactions into valid and invalid, in input order.
 * Only valid transactions enter the seen set, so a rejected negative amount
 * does not make a later identical transaction a duplicate.
 */
export function validateTransactions<T extends Transaction>(
  transactions: T[],
  seen: SeenTransactions = new Set(),
  options?: EngineOptions
): ValidationResult<T> {
  const logger = resolveLogger(options);
  const valid: T[] = [];
  const invalid: RejectedTransaction<T>[] = [];

  for (const transaction of transactions) {
    const errors = checkTransaction(transaction, seen);
    if (errors.length > 0) {
      const message = joinMessages(errors);
      logger.debug(
        { date: formatTimestamp(transaction.date), amount: transaction.amount, message },
        "Rejected transaction"
      );
      invalid.push({ ...transaction, errors, message });
      continue;
    }
    seen.add(transactionKey(transaction));
    valid.push(transaction);
  }

  return { valid, invalid, seen };
}
