// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { config as loadDotenv } from "dotenv";
import { z } from "zod";

import type { LogLevel } from "./logging.js";
import { isValidTimeZone } from "./utils/time.js";

export const DEFAULT_DATABASE_URL = "./data/chatvault.sqlite";
export const DEFAULT_TIME_ZONE = "Europe/Kyiv";

export type DatabaseTarget =
  | { kind: "sqlite"; filename: string }
  | { kind: "postgres"; connectionString: string };

export interface AppConfig {
  readonly database: DatabaseTarget;
  /** IANA zone for naive user input and for display. */
  readonly timeZone: string;
  readonly logLevel: LogLevel;
  readonly pool: {
    readonly max: number;
    readonly connectionTimeoutMillis: number;
  };
}

/**
 * Thrown when environment variables fail validation. The message lists
 * every failing variable.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envSchema = z.object({
  DATABASE_URL: z.preprocess(
    blankToUndefined,
    z.string().trim().default(DEFAULT_DATABASE_URL),
  ),
  CHATVAULT_TIMEZONE: z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .default(DEFAULT_TIME_ZONE)
      .refine(isValidTimeZone, "must be an IANA time zone"),
  ),
  LOG_LEVEL: z.preprocess(
    (value) =>
      typeof value === "string" ? blankToUndefined(value.toLowerCase()) : value,
    z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
  ),
  PG_POOL_MAX: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(10),
  ),
  PG_CONNECT_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(5000),
  ),
});

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Map a `DATABASE_URL` to a backend.
 *
 * - `postgres://…`, `postgresql://…` select PostgreSQL
 * - `sqlite::memory:` selects an in-memory SQLite database
 * - `sqlite:///abs/path`, `sqlite:rel/path` or a bare path select a
 *   SQLite file
 */
export function parseDatabaseUrl(url: string): DatabaseTarget {
  const trimmed = url.trim();
  if (/^postgres(?:ql)?:\/\//i.test(trimmed)) {
    return { kind: "postgres", connectionString: trimmed };
  }
  if (/^sqlite::memory:$/i.test(trimmed) || trimmed === ":memory:") {
    return { kind: "sqlite", filename: ":memory:" };
  }
  const sqlite = /^sqlite:(?:\/\/)?(.+)$/i.exec(trimmed);
  return { kind: "sqlite", filename: sqlite?.[1] ?? trimmed };
}

/**
 * Load variables from `.env` in the working directory into
 * `process.env`. Variables already set are kept.
 */
export function loadEnvironmentFile(path?: string): void {
  loadDotenv(path === undefined ? {} : { path });
}

/**
 * Validate configuration from environment variables.
 *
 * @param env - defaults to `process.env`
 * @param overrides - values from command-line flags, taking precedence
 */
export function loadConfig(
  env: Environment = process.env,
  overrides: { databaseUrl?: string | undefined } = {},
): AppConfig {
  const result = envSchema.safeParse({
    ...env,
    ...(overrides.databaseUrl !== undefined && {
      DATABASE_URL: overrides.databaseUrl,
    }),
  });
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }
  const parsed = result.data;
  return Object.freeze({
    database: parseDatabaseUrl(parsed.DATABASE_URL),
    timeZone: parsed.CHATVAULT_TIMEZONE,
    logLevel: parsed.LOG_LEVEL,
    pool: Object.freeze({
      max: parsed.PG_POOL_MAX,
      connectionTimeoutMillis: parsed.PG_CONNECT_TIMEOUT_MS,
    }),
  });
}
