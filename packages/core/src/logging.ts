// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import pino, { type LevelWithSilent, type Logger } from "pino";

export type LogLevel = LevelWithSilent;

export function isLogLevel(value: unknown): value is LogLevel {
  return (
    typeof value === "string" &&
    (value === "silent" || pino.levels.values[value] !== undefined)
  );
}

/**
 * Level before configuration is loaded. An unknown `LOG_LEVEL` is left
 * for `loadConfig` to report; until then the root logs at `info`.
 */
function initialLevel(): LogLevel {
  const requested = process.env["LOG_LEVEL"]?.trim().toLowerCase();
  return isLogLevel(requested) ? requested : "info";
}

const root = pino(
  { name: "chatvault", level: initialLevel() },
  pino.destination(2),
);

const components = new Map<string, Logger>();

/**
 * Component logger (`{ component }` binding on the root logger).
 *
 * Loggers are cached so that {@link setLogLevel} can reach every one
 * handed out so far. Output goes to stderr; stdout belongs to the CLI.
 */
export function getLogger(component: string): Logger {
  let logger = components.get(component);
  if (logger === undefined) {
    logger = root.child({ component });
    components.set(component, logger);
  }
  return logger;
}

export function setLogLevel(level: LogLevel): void {
  root.level = level;
  for (const logger of components.values()) {
    logger.level = level;
  }
}
