import { describe, it, expect } from "vitest";
import { getPerformanceMetrics } from "./metrics";
import { at } from "@/fixtures/ledger";

describe("getPerformanceMetrics", () => {
  it("formats time with milliseconds and memory in MB", () => {
    const now = at("2024-03-01 09:15:30");
    now.setUTCMilliseconds(42);
    expect(getPerformanceMetrics(now, 52_428_800)).toEqual({
      time: "2024-03-01 09:15:30.042",
      memory: "50.00 MB",
      threads: 1,
    });
  });

  it("reads the live resident set size by default", () => {
    expect(getPerformanceMetrics().memory).toMatch(/^\d+\.\d{2} MB$/);
  });
});
