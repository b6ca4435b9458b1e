/**
 * Configuration Loading
 *
 * Reads settings from the process environment. Missing store settings are
 * reported together in a single ConfigError.
 */

import { z } from "zod";
import type { LevelWithSilent } from "pino";
import type { DatabaseConfig } from "./infrastructure/database.js";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const EnvSchema = z.object({
  MONGO_URI: z.string().min(1, "must not be empty"),
  MONGO_DB: z.string().min(1, "must not be empty"),
  // An empty `PORT=` line in .env counts as unset
  PORT: z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.coerce.number().int().min(0).max(65535).default(5050)
  ),
  HOST: z.string().min(1).default("0.0.0.0"),
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  CORS_ORIGIN: z
    .string()
    .min(1)
    .default("*")
    .transform((value) =>
      value === "*"
        ? value
        : value
            .split(",")
            .map((origin) => origin.trim())
            .filter((origin) => origin.length > 0)
    ),
});

export interface Config {
  readonly mongo: DatabaseConfig;
  readonly port: number;
  readonly host: string;
  readonly production: boolean;
  readonly logLevel: LevelWithSilent;
  /**
   * `*`, or the list of origins allowed to call the API from a browser.
   */
  readonly corsOrigin: string | string[];
}

export class ConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Validates the environment and returns the service configuration.
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    mongo: { uri: vars.MONGO_URI, name: vars.MONGO_DB },
    port: vars.PORT,
    host: vars.HOST,
    production: vars.NODE_ENV === "production",
    logLevel: vars.LOG_LEVEL,
    corsOrigin: vars.CORS_ORIGIN,
  };
}
