import Big from "big.js";

/** Fraction digits of a number's full binary expansion; enough for any money value. */
const EXACT_DIGITS = 100;

/**
 * Round a monetary value to 2 decimals for emission, half to even on the
 * exact stored value: 0.125 -> 0.12, 2.675 -> 2.67 (stored just below .675).
 * Accumulation stays at full precision; call this only when building output.
 */
export function roundMoney(amount: number): number {
  const rounded = new Big(amount.toFixed(EXACT_DIGITS)).round(2, Big.roundHalfEven).toNumber();
  return Object.is(rounded, -0) ? 0 : rounded;
}
