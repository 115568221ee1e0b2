import { describe, it, expect } from "vitest";
import {
  RETURNS_PRESETS,
  compoundReturn,
  inflationToDecimal,
  investmentHorizonYears,
  projectedProfit,
} from "./returns";

describe("investmentHorizonYears", () => {
  it("counts years to 60, with a 5-year floor", () => {
    expect(investmentHorizonYears(30)).toBe(30);
    expect(investmentHorizonYears(59)).toBe(1);
    expect(investmentHorizonYears(60)).toBe(5);
    expect(investmentHorizonYears(65)).toBe(5);
  });
});

describe("compoundReturn", () => {
  it("compounds annually and deflates by inflation", () => {
    expect(compoundReturn(1000, 2, 0.1, 0)).toBeCloseTo(1210, 9);
    expect(compoundReturn(1210, 2, 0, 0.1)).toBeCloseTo(1000, 9);
    expect(compoundReturn(1000, 5, 0.0711, 0.03)).toBeCloseTo(1216.0851, 3);
  });

  it("is zero for nothing invested", () => {
    expect(projectedProfit(0, 25, 0.1449, 0.04)).toBe(0);
  });

  it("matches the preset rates", () => {
    const years = investmentHorizonYears(35);
    const inflation = inflationToDecimal(4);
    expect(inflation).toBeCloseTo(0.04, 12);
    expect(projectedProfit(150, years, RETURNS_PRESETS.NPS.annualRate, inflation)).toBeCloseTo(
      163.3345,
      3
    );
    expect(projectedProfit(150, years, RETURNS_PRESETS.INDEX.annualRate, inflation)).toBeCloseTo(
      1507.4738,
      3
    );
  });

  it("enables the tax benefit only for NPS", () => {
    expect(RETURNS_PRESETS.NPS.includeTaxBenefit).toBe(true);
    expect(RETURNS_PRESETS.INDEX.includeTaxBenefit).toBe(false);
  });
});
