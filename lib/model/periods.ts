/**
 * Period rules applied to a transaction's remnant.
 * q (override) replaces, p (bonus) adds, k (evaluation) only tests membership.
 * All intervals are inclusive at both ends.
 */

import type {
  BonusPeriod,
  EvaluationPeriod,
  OverridePeriod,
  Period,
} from "@/lib/types/zod";
import { resolveLogger, type EngineOptions } from "@/lib/observability/logger";
import { formatTimestamp } from "@/lib/utils/datetime";

export function isWithinPeriod(timestamp: Date, period: Period): boolean {
  const t = timestamp.getTime();
  return period.start.getTime() <= t && t <= period.end.getTime();
}

/**
 * Matching override with the latest start, or null.
 * Equal starts: the last match in input order wins.
 */
export function findOverridePeriod(
  timestamp: Date,
  overridePeriods: OverridePeriod[]
): OverridePeriod | null {
  let best: OverridePeriod | null = null;
  for (const period of overridePeriods) {
    if (!isWithinPeriod(timestamp, period)) continue;
    if (best === null || period.start.getTime() >= best.start.getTime()) {
      best = period;
    }
  }
  return best;
}

export function applyOverride(
  timestamp: Date,
  baseRemnant: number,
  overridePeriods: OverridePeriod[],
  options?: EngineOptions
): number {
  const period = findOverridePeriod(timestamp, overridePeriods);
  if (!period) return baseRemnant;

  resolveLogger(options).debug(
    { date: formatTimestamp(timestamp), from: baseRemnant, to: period.fixed },
    "Override period applied"
  );
  return period.fixed;
}

/** Adds `extra` of every matching bonus period; bonuses stack. */
export function applyBonus(
  timestamp: Date,
  remnant: number,
  bonusPeriods: BonusPeriod[],
  options?: EngineOptions
): number {
  const logger = resolveLogger(options);
  let adjusted = remnant;
  for (const period of bonusPeriods) {
    if (!isWithinPeriod(timestamp, period)) continue;
    adjusted += period.extra;
    logger.debug(
      { date: formatTimestamp(timestamp), extra: period.extra, remnant: adjusted },
      "Bonus period applied"
    );
  }
  return adjusted;
}

export function inEvaluationPeriod(
  timestamp: Date,
  evaluationPeriods: EvaluationPeriod[]
): boolean {
  return evaluationPeriods.some((period) => isWithinPeriod(timestamp, period));
}

/** Override, then bonus. The remnant > 0 test happens after both. */
export function adjustRemnant(
  timestamp: Date,
  baseRemnant: number,
  overridePeriods: OverridePeriod[],
  bonusPeriods: BonusPeriod[],
  options?: EngineOptions
): number {
  const overridden = applyOverride(timestamp, baseRemnant, overridePeriods, options);
  return applyBonus(timestamp, overridden, bonusPeriods, options);
}
