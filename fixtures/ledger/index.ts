/**
 * Shared ledger fixtures for engine and handler tests.
 */

import type { ReturnsRequest } from "@/lib/types/zod";
import { parseTimestamp } from "@/lib/utils/datetime";

/** Parse a fixture timestamp; fixtures are always well-formed. */
export function at(value: string): Date {
  const parsed = parseTimestamp(value);
  if (!parsed) throw new Error(`Bad fixture timestamp: ${value}`);
  return parsed;
}

/**
 * JSON body for the returns endpoints: one override (May), one bonus (Aug-Sep),
 * a zero round-up in November and two evaluation periods (Apr-Sep, full year).
 */
export const RETURNS_BODY = {
  age: 35,
  wage: 55_000,
  inflation: 4,
  q: [{ fixed: 30, start: "2024-05-01 00:00:00", end: "2024-05-31 23:59:59" }],
  p: [{ extra: 10, start: "2024-08-01 00:00:00", end: "2024-09-30 23:59:59" }],
  k: [
    { start: "2024-04-01 00:00:00", end: "2024-09-30 23:59:59" },
    { start: "2024-01-01 00:00:00", end: "2024-12-31 23:59:59" },
  ],
  transactions: [
    { date: "2024-02-14 12:00:00", amount: 1230 },
    { date: "2024-05-20 09:30:00", amount: 4410 },
    { date: "2024-08-03 18:45:10", amount: 760 },
    { date: "2024-11-25 07:05:00", amount: 2000 },
  ],
};

export function createReturnsRequest(overrides?: Partial<ReturnsRequest>): ReturnsRequest {
  return {
    age: RETURNS_BODY.age,
    wage: RETURNS_BODY.wage,
    inflation: RETURNS_BODY.inflation,
    q: RETURNS_BODY.q.map((p) => ({ fixed: p.fixed, start: at(p.start), end: at(p.end) })),
    p: RETURNS_BODY.p.map((p) => ({ extra: p.extra, start: at(p.start), end: at(p.end) })),
    k: RETURNS_BODY.k.map((p) => ({ start: at(p.start), end: at(p.end) })),
    transactions: RETURNS_BODY.transactions.map((t) => ({ date: at(t.date), amount: t.amount })),
    ...overrides,
  };
}
