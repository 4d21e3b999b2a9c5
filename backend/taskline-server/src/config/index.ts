/**
 * Process configuration
 *
 * Every knob comes from the environment and is validated here with zod.
 * Nothing else in the server reads process.env. A `.env` file, when
 * present, fills in variables the environment leaves unset.
 */

import fs from "fs";
import dotenv from "dotenv";
import { z } from "zod";
import { getDefaultDbPath } from "../db/connection";
import { LogLevel } from "../utils/logger";

const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const satisfies readonly LogLevel[];

const flag = (defaultValue: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === "true" || value === "1"));

const integer = (defaultValue: number, min: number) =>
  z.coerce.number().int().min(min).default(defaultValue);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  TASKLINE_DB_PATH: z.string().min(1).optional(),
  TASKLINE_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  TASKLINE_HTTP_LOGGER: flag(false),
  TASKLINE_EMBEDDED_WORKER: flag(false),
  // Clamped to 1-32, not rejected
  TASKLINE_WORKER_CONCURRENCY: z.coerce
    .number()
    .int()
    .default(1)
    .transform((value) => Math.max(1, Math.min(value, 32))),
  TASKLINE_POLL_INTERVAL_MS: integer(250, 10),
  TASKLINE_TASK_TIMEOUT_MS: integer(60000, 1),
  TASKLINE_LEASE_MS: integer(120000, 1),
  TASKLINE_ECHO_DELAY_MS: integer(20000, 0),
  TASKLINE_SIGNAL_RETRY_ATTEMPTS: integer(5, 1),
  TASKLINE_SIGNAL_RETRY_BASE_MS: integer(100, 0),
});

export interface TasklineConfig {
  port: number;
  host: string;
  dbPath: string;
  logLevel: LogLevel;
  httpLogger: boolean;
  embeddedWorker: boolean;
  worker: {
    concurrency: number;
    pollIntervalMs: number;
    taskTimeoutMs: number;
    leaseMs: number;
    echoDelayMs: number;
  };
  signalRetry: {
    attempts: number;
    baseDelayMs: number;
  };
}

/**
 * Error thrown when environment configuration fails validation
 */
export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    const details = issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    super(`Invalid configuration: ${details}`);
    this.name = "ConfigError";
  }
}

/**
 * Copy variables from a dotenv file into `env` without overriding ones
 * already set.
 *
 * @returns false if the file does not exist
 */
export function loadEnvFile(filePath: string = ".env", env: NodeJS.ProcessEnv = process.env): boolean {
  if (!fs.existsSync(filePath)) {
    return false;
  }
  const parsed = dotenv.parse(fs.readFileSync(filePath));
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
  return true;
}

/**
 * Parse configuration from an environment map.
 *
 * Empty strings count as unset.
 *
 * @throws ConfigError listing every offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TasklineConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      present[key] = value;
    }
  }

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    dbPath: parsed.TASKLINE_DB_PATH ?? getDefaultDbPath(),
    logLevel: parsed.TASKLINE_LOG_LEVEL,
    httpLogger: parsed.TASKLINE_HTTP_LOGGER,
    embeddedWorker: parsed.TASKLINE_EMBEDDED_WORKER,
    worker: {
      concurrency: parsed.TASKLINE_WORKER_CONCURRENCY,
      pollIntervalMs: parsed.TASKLINE_POLL_INTERVAL_MS,
      taskTimeoutMs: parsed.TASKLINE_TASK_TIMEOUT_MS,
      leaseMs: parsed.TASKLINE_LEASE_MS,
      echoDelayMs: parsed.TASKLINE_ECHO_DELAY_MS,
    },
    signalRetry: {
      attempts: parsed.TASKLINE_SIGNAL_RETRY_ATTEMPTS,
      baseDelayMs: parsed.TASKLINE_SIGNAL_RETRY_BASE_MS,
    },
  };
}
