/**
 * Transport-neutral request handlers.
 * Each takes a decoded JSON body and returns { status, body }; an HTTP layer
 * only has to mount ROUTES and serialize the result.
 */

import { z } from "zod";
import {
  FilterRequestSchema,
  ParseRequestSchema,
  ReturnsRequestSchema,
  ValidatorRequestSchema,
  type EnrichedTransactionRecord,
  type FilterReport,
  type ReturnsResult,
  type ValidationReport,
} from "@/lib/types/zod";
import {
  calculateIndexReturns,
  calculateNpsReturns,
  filterByPeriods,
  parseTransactions,
  validateEnrichedTransactions,
} from "@/lib/model/engine";
import { resolveLogger, type EngineOptions } from "@/lib/observability/logger";
import { getPerformanceMetrics, type PerformanceMetrics } from "@/lib/observability/metrics";

export const API_BASE_PATH = "/api/v1";

export interface ErrorBody {
  error: string;
  issues?: { path: string; message: string }[];
}

export interface HandlerResponse<T> {
  status: number;
  body: T | ErrorBody;
}

export type Handler<T> = (body: unknown, options?: EngineOptions) => HandlerResponse<T>;

function issuesOf(error: z.ZodError): NonNullable<ErrorBody["issues"]> {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/** Parse the body with `schema`, run the engine, map failures to 422 / 500. */
function withSchema<S extends z.ZodTypeAny, Out>(
  route: string,
  schema: S,
  run: (input: z.output<S>, options?: EngineOptions) => Out
): Handler<Out> {
  return (body, options) => {
    const logger = resolveLogger(options);
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      logger.warn({ route, issues: parsed.error.issues.length }, "Rejected request body");
      return {
        status: 422,
        body: { error: "Invalid request", issues: issuesOf(parsed.error) },
      };
    }

    try {
      return { status: 200, body: run(parsed.data, options) };
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      logger.error({ route, err }, "Request failed");
      return { status: 500, body: { error: message } };
    }
  };
}

export const parseHandler: Handler<EnrichedTransactionRecord[]> = withSchema(
  "transactions:parse",
  ParseRequestSchema,
  (transactions, options) => parseTransactions(transactions, options)
);

export const validatorHandler: Handler<ValidationReport> = withSchema(
  "transactions:validator",
  ValidatorRequestSchema,
  (request, options) => validateEnrichedTransactions(request.transactions, options)
);

export const filterHandler: Handler<FilterReport> = withSchema(
  "transactions:filter",
  FilterRequestSchema,
  (request, options) =>
    filterByPeriods(request.transactions, request.q, request.p, request.k, options)
);

export const returnsNpsHandler: Handler<ReturnsResult> = withSchema(
  "returns:nps",
  ReturnsRequestSchema,
  calculateNpsReturns
);

export const returnsIndexHandler: Handler<ReturnsResult> = withSchema(
  "returns:index",
  ReturnsRequestSchema,
  calculateIndexReturns
);

export const performanceHandler: Handler<PerformanceMetrics> = () => ({
  status: 200,
  body: getPerformanceMetrics(),
});

export interface Route {
  method: "GET" | "POST";
  path: string;
  handler: Handler<unknown>;
}

export const ROUTES: Route[] = [
  { method: "POST", path: `${API_BASE_PATH}/transactions:parse`, handler: parseHandler },
  { method: "POST", path: `${API_BASE_PATH}/transactions:validator`, handler: validatorHandler },
  { method: "POST", path: `${API_BASE_PATH}/transactions:filter`, handler: filterHandler },
  { method: "POST", path: `${API_BASE_PATH}/returns:nps`, handler: returnsNpsHandler },
  { method: "POST", path: `${API_BASE_PATH}/returns:index`, handler: returnsIndexHandler },
  { method: "GET", path: `${API_BASE_PATH}/performance`, handler: performanceHandler },
];

export function findRoute(method: string, path: string): Route | undefined {
  return ROUTES.find((r) => r.method === method.toUpperCase() && r.path === path);
}
