// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import {
  type DatabaseContext,
  loadConfig,
  setLogLevel,
  withDatabase,
} from "@chatvault/core";

export interface DatabaseOptions {
  /** Overrides `DATABASE_URL`. */
  database?: string;
}

/**
 * Load configuration from the environment and run `work` against the
 * configured archive. The database is closed afterwards.
 */
export async function openArchive<T>(
  options: DatabaseOptions,
  work: (ctx: DatabaseContext) => Promise<T>,
  initialize = false,
): Promise<T> {
  const config = loadConfig(process.env, { databaseUrl: options.database });
  setLogLevel(config.logLevel);
  return withDatabase(config, work, { initialize });
}
