import { describe, it, expect } from "vitest";
import { roundMoney } from "./format";

describe("roundMoney", () => {
  it("rounds to 2 decimals", () => {
    expect(roundMoney(86.8848376752461)).toBe(86.88);
    expect(roundMoney(1684.5149810481555)).toBe(1684.51);
    expect(roundMoney(40.0)).toBe(40);
  });

  it("rounds exact ties to the even cent", () => {
    expect(roundMoney(0.125)).toBe(0.12);
    expect(roundMoney(0.375)).toBe(0.38);
    expect(roundMoney(-0.125)).toBe(-0.12);
  });

  it("rounds the stored binary value, not its shortest decimal form", () => {
    expect(roundMoney(1.005)).toBe(1);
    expect(roundMoney(2.675)).toBe(2.67);
    expect(roundMoney(1.015)).toBe(1.01);
  });

  it("never emits negative zero", () => {
    expect(Object.is(roundMoney(-0.001), 0)).toBe(true);
  });
});
