/**
 * Fixed constants for the round-up savings model.
 */

/** Transactions round up to the next multiple of this amount. */
export const ROUNDING_BASE = 100;

/** Retirement age the investment horizon counts towards. */
export const RETIREMENT_AGE = 60;

/** Horizon (years) used once the investor is at or past RETIREMENT_AGE. */
export const MIN_HORIZON_YEARS = 5;

/** Compounding periods per year. */
export const COMPOUNDING_PER_YEAR = 1;

/** Annual return, decimal. NPS-style preset: 7.11%. */
export const NPS_ANNUAL_RATE = 0.0711;

/** Annual return, decimal. Index-fund preset (NIFTY 50): 14.49%. */
export const INDEX_ANNUAL_RATE = 0.1449;

/** NPS deduction caps: share of annual income, and absolute ceiling. */
export const NPS_DEDUCTION_INCOME_SHARE = 0.1;
export const NPS_DEDUCTION_CAP = 200_000;

/** Progressive slabs: each rate applies to income above `from`, up to the next slab. */
export const TAX_SLABS: ReadonlyArray<{ from: number; rate: number }> = [
  { from: 0, rate: 0 },
  { from: 700_000, rate: 0.1 },
  { from: 1_000_000, rate: 0.15 },
  { from: 1_200_000, rate: 0.2 },
  { from: 1_500_000, rate: 0.3 },
];

export const NEGATIVE_AMOUNT_MESSAGE = "Negative amounts are not allowed";
export const DUPLICATE_TRANSACTION_MESSAGE = "Duplicate transaction";

/** Joins multiple validation messages on one transaction. */
export const VALIDATION_MESSAGE_DELIMITER = "; ";
