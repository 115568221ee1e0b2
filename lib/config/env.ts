/**
 * Environment configuration: .env via dotenv, validated with zod.
 */

import dotenv from "dotenv";
import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  DEBUG: z
    .string()
    .default("false")
    .transform((v) => v.trim().toLowerCase() === "true"),
  APP_NAME: z.string().min(1).default("roundup-savings"),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  appName: string;
  logLevel: LogLevel;
  debug: boolean;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join(", ")}`);
    this.name = "ConfigError";
  }
}

export interface LoadConfigOptions {
  /** Variables to read. When omitted, .env is loaded into process.env first. */
  env?: NodeJS.ProcessEnv;
  /** Path passed to dotenv; defaults to .env in the working directory. */
  dotenvPath?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  let env = options.env;
  if (!env) {
    dotenv.config({ path: options.dotenvPath });
    env = process.env;
  }

  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const { LOG_LEVEL, DEBUG, APP_NAME } = result.data;
  return {
    appName: APP_NAME,
    // DEBUG only ever raises verbosity
    logLevel: DEBUG && LOG_LEVEL !== "trace" ? "debug" : LOG_LEVEL,
    debug: DEBUG,
  };
}
