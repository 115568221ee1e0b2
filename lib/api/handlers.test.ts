import { describe, it, expect, vi } from "vitest";
import {
  API_BASE_PATH,
  filterHandler,
  findRoute,
  parseHandler,
  performanceHandler,
  returnsIndexHandler,
  returnsNpsHandler,
  validatorHandler,
} from "./handlers";
import { RETURNS_BODY } from "@/fixtures/ledger";
import type { EngineLogger } from "@/lib/observability/logger";

describe("handlers", () => {
  it("parses and enriches transactions", () => {
    const res = parseHandler([{ date: "2024-01-15 00:00:00", amount: 950 }]);
    expect(res).toEqual({
      status: 200,
      body: [{ date: "2024-01-15 00:00:00", amount: 950, ceiling: 1000, remnant: 50 }],
    });
  });

  it("rejects a malformed body with 422 and issue paths", () => {
    const logger: EngineLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const res = parseHandler([{ date: "15/01/2024", amount: "950" }], { logger });
    expect(res.status).toBe(422);
    expect(res.body).toEqual({
      error: "Invalid request",
      issues: [
        {
          path: "0.date",
          message: 'Expected a timestamp in yyyy-MM-dd HH:mm:ss format (got "15/01/2024")',
        },
        { path: "0.amount", message: "Expected number, received string" },
      ],
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("validates enriched transactions and ignores wage", () => {
    const tx = { date: "2024-01-15 00:00:00", amount: 950, ceiling: 1000, remnant: 50 };
    const res = validatorHandler({ wage: 50_000, transactions: [tx, tx] });
    expect(res).toEqual({
      status: 200,
      body: { valid: [tx], invalid: [{ ...tx, message: "Duplicate transaction" }] },
    });
  });

  it("keys duplicates on the parsed instant, so a bare date matches its midnight", () => {
    const enriched = { amount: 950, ceiling: 1000, remnant: 50 };
    const res = validatorHandler({
      wage: 50_000,
      transactions: [
        { date: "2024-01-15", ...enriched },
        { date: "2024-01-15 00:00:00", ...enriched },
        { date: "2024-01-15T00:00:00", ...enriched },
      ],
    });
    expect(res).toEqual({
      status: 200,
      body: {
        valid: [{ date: "2024-01-15 00:00:00", ...enriched }],
        invalid: [
          { date: "2024-01-15 00:00:00", ...enriched, message: "Duplicate transaction" },
          { date: "2024-01-15 00:00:00", ...enriched, message: "Duplicate transaction" },
        ],
      },
    });
  });

  it("treats missing period lists as empty", () => {
    const res = filterHandler({ transactions: [{ date: "2024-01-15", amount: 950 }] });
    expect(res).toEqual({
      status: 200,
      body: {
        valid: [
          { date: "2024-01-15 00:00:00", amount: 950, ceiling: 1000, remnant: 50, inKPeriod: false },
        ],
        invalid: [],
      },
    });
  });

  it("serves both returns presets from the same body", () => {
    const nps = returnsNpsHandler(RETURNS_BODY);
    const index = returnsIndexHandler(RETURNS_BODY);
    expect(nps.status).toBe(200);
    expect(index.status).toBe(200);
    expect(nps.body).toMatchObject({
      totalTransactionAmount: 8400,
      totalCeiling: 8600,
      savingsByDates: [{ amount: 80, profits: 87.11 }, { amount: 150, profits: 163.33 }],
    });
    expect(index.body).toMatchObject({
      savingsByDates: [{ profits: 803.99 }, { profits: 1507.47 }],
    });
  });

  it("requires age, wage and inflation on returns requests", () => {
    const { age: _age, ...withoutAge } = RETURNS_BODY;
    const res = returnsNpsHandler(withoutAge);
    expect(res.status).toBe(422);
    expect(res.body).toMatchObject({ issues: [{ path: "age", message: "Required" }] });
  });

  it("reports process metrics", () => {
    const res = performanceHandler(undefined);
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ threads: 1 });
  });

  it("routes by method and path", () => {
    expect(findRoute("post", `${API_BASE_PATH}/returns:nps`)?.handler).toBe(returnsNpsHandler);
    expect(findRoute("GET", `${API_BASE_PATH}/performance`)?.handler).toBe(performanceHandler);
    expect(findRoute("GET", `${API_BASE_PATH}/returns:nps`)).toBeUndefined();
  });
});
