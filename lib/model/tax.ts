/**
 * Simplified progressive income tax and the NPS deduction benefit.
 */

import {
  NPS_DEDUCTION_CAP,
  NPS_DEDUCTION_INCOME_SHARE,
  TAX_SLABS,
} from "@/lib/model/constants";

/** Tax on annual income using TAX_SLABS. */
export function calculateTax(annualIncome: number): number {
  let tax = 0;
  for (const [i, slab] of TAX_SLABS.entries()) {
    if (annualIncome <= slab.from) break;
    const upper = TAX_SLABS[i + 1]?.from ?? Infinity;
    tax += (Math.min(annualIncome, upper) - slab.from) * slab.rate;
  }
  return tax;
}

/** Deductible investment: min(investment, 10% of income, 200,000). */
export function npsDeduction(periodInvestment: number, annualIncome: number): number {
  return Math.min(
    periodInvestment,
    NPS_DEDUCTION_INCOME_SHARE * annualIncome,
    NPS_DEDUCTION_CAP
  );
}

/** Tax saved by deducting the period's investment from income. 0 when nothing was invested. */
export function taxBenefit(periodInvestment: number, annualIncome: number): number {
  if (periodInvestment <= 0) return 0;
  const deduction = npsDeduction(periodInvestment, annualIncome);
  return calculateTax(annualIncome) - calculateTax(annualIncome - deduction);
}
