/**
 * Returns projection: annual compounding deflated by inflation.
 */

import type { ReturnsPreset } from "@/lib/types/zod";
import {
  COMPOUNDING_PER_YEAR,
  INDEX_ANNUAL_RATE,
  MIN_HORIZON_YEARS,
  NPS_ANNUAL_RATE,
  RETIREMENT_AGE,
} from "@/lib/model/constants";

export interface ReturnsPresetConfig {
  /** Annual return, decimal. */
  annualRate: number;
  includeTaxBenefit: boolean;
}

export const RETURNS_PRESETS: Record<ReturnsPreset, ReturnsPresetConfig> = {
  NPS: { annualRate: NPS_ANNUAL_RATE, includeTaxBenefit: true },
  INDEX: { annualRate: INDEX_ANNUAL_RATE, includeTaxBenefit: false },
};

/** Years until RETIREMENT_AGE; MIN_HORIZON_YEARS once there. */
export function investmentHorizonYears(age: number): number {
  return age < RETIREMENT_AGE ? RETIREMENT_AGE - age : MIN_HORIZON_YEARS;
}

/** Inflation-adjusted (real) value of `investedAmount` after `years`. */
export function compoundReturn(
  investedAmount: number,
  years: number,
  annualRate: number,
  inflation: number
): number {
  const n = COMPOUNDING_PER_YEAR;
  const nominal = investedAmount * Math.pow(1 + annualRate / n, n * years);
  return nominal / Math.pow(1 + inflation, years);
}

/** Real gain over the invested amount. */
export function projectedProfit(
  investedAmount: number,
  years: number,
  annualRate: number,
  inflation: number
): number {
  return compoundReturn(investedAmount, years, annualRate, inflation) - investedAmount;
}

/** Inflation is supplied as a percentage (4 means 4%). */
export function inflationToDecimal(inflationPercent: number): number {
  return inflationPercent / 100;
}
