/**
 * Logging hook for the engine.
 * Callers inject a pino logger; without one the engine runs silent.
 */

import { pino, type Logger } from "pino";
import type { AppConfig } from "@/lib/config/env";

/** The slice of a pino logger the engine writes to. */
export type EngineLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

/** Options accepted by every engine entry point. */
export interface EngineOptions {
  logger?: EngineLogger;
}

export const silentLogger: EngineLogger = pino({ enabled: false });

export function resolveLogger(options?: EngineOptions): EngineLogger {
  return options?.logger ?? silentLogger;
}

/** Process logger built from config. */
export function createLogger(config: Pick<AppConfig, "appName" | "logLevel">): Logger {
  return pino({ name: config.appName, level: config.logLevel });
}
