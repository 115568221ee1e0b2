/**
 * Zod schemas for the round-up savings engine.
 * Request bodies are parsed here; the engine only ever sees the inferred types.
 */

import { z } from "zod";
import { TIMESTAMP_FORMAT, parseTimestamp } from "@/lib/utils/datetime";

/** Boundary timestamp string, parsed to a Date instant. */
export const TimestampSchema = z.string().transform((value, ctx) => {
  const parsed = parseTimestamp(value);
  if (!parsed) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected a timestamp in ${TIMESTAMP_FORMAT} format (got "${value}")`,
    });
    return z.NEVER;
  }
  return parsed;
});

export const TransactionSchema = z.object({
  date: TimestampSchema,
  amount: z.number().finite(),
});
export type Transaction = z.infer<typeof TransactionSchema>;

/** Transaction with its round-up already derived (validator endpoint input). */
export const EnrichedTransactionSchema = TransactionSchema.extend({
  ceiling: z.number().finite(),
  remnant: z.number().finite(),
});
export type EnrichedTransaction = z.infer<typeof EnrichedTransactionSchema>;

/** Override period (q): replaces the remnant with `fixed`. Inclusive interval. */
export const OverridePeriodSchema = z.object({
  fixed: z.number().finite(),
  start: TimestampSchema,
  end: TimestampSchema,
});
export type OverridePeriod = z.infer<typeof OverridePeriodSchema>;

/** Bonus period (p): adds `extra` to the remnant. Inclusive interval. */
export const BonusPeriodSchema = z.object({
  extra: z.number().finite(),
  start: TimestampSchema,
  end: TimestampSchema,
});
export type BonusPeriod = z.infer<typeof BonusPeriodSchema>;

/** Evaluation period (k). Callers keep each one inside a single calendar year. */
export const EvaluationPeriodSchema = z.object({
  start: TimestampSchema,
  end: TimestampSchema,
});
export type EvaluationPeriod = z.infer<typeof EvaluationPeriodSchema>;

/** Any inclusive [start, end] interval. */
export type Period = Pick<EvaluationPeriod, "start" | "end">;

export const ParseRequestSchema = z.array(TransactionSchema);
export type ParseRequest = z.infer<typeof ParseRequestSchema>;

export const ValidatorRequestSchema = z.object({
  /** Monthly wage. Accepted for parity with the returns request; validation ignores it. */
  wage: z.number().finite(),
  transactions: z.array(EnrichedTransactionSchema),
});
export type ValidatorRequest = z.infer<typeof ValidatorRequestSchema>;

export const FilterRequestSchema = z.object({
  q: z.array(OverridePeriodSchema).default([]),
  p: z.array(BonusPeriodSchema).default([]),
  k: z.array(EvaluationPeriodSchema).default([]),
  transactions: z.array(TransactionSchema),
});
export type FilterRequest = z.infer<typeof FilterRequestSchema>;

export const ReturnsRequestSchema = FilterRequestSchema.extend({
  age: z.number().int().min(0),
  /** Monthly wage; annual income is wage * 12. */
  wage: z.number().finite(),
  /** Annual inflation as a percentage, e.g. 4 for 4%. */
  inflation: z.number().finite(),
});
export type ReturnsRequest = z.infer<typeof ReturnsRequestSchema>;

export const ReturnsPresetSchema = z.enum(["NPS", "INDEX"]);
export type ReturnsPreset = z.infer<typeof ReturnsPresetSchema>;

/** Enriched transaction as emitted at the boundary. */
export interface EnrichedTransactionRecord {
  date: string;
  amount: number;
  ceiling: number;
  remnant: number;
}

/** Validator endpoint rejection: the full record plus its joined error messages. */
export interface RejectedEnrichedRecord extends EnrichedTransactionRecord {
  message: string;
}

/** Filter endpoint rejection. */
export interface RejectedTransactionRecord {
  date: string;
  amount: number;
  message: string;
}

export interface FilteredTransactionRecord extends EnrichedTransactionRecord {
  inKPeriod: boolean;
}

export interface ValidationReport {
  valid: EnrichedTransactionRecord[];
  invalid: RejectedEnrichedRecord[];
}

export interface FilterReport {
  valid: FilteredTransactionRecord[];
  invalid: RejectedTransactionRecord[];
}

export interface PeriodSavings {
  start: string;
  end: string;
  amount: number;
  profits: number;
  taxBenefit: number;
}

export interface ReturnsResult {
  totalTransactionAmount: number;
  totalCeiling: number;
  savingsByDates: PeriodSavings[];
}
