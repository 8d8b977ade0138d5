// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

import type { AppConfig } from "../config.js";
import type { DatabaseAdapter } from "./adapter.js";
import { PostgresAdapter } from "./postgres-adapter.js";
import { SqliteAdapter } from "./sqlite-adapter.js";

/**
 * Open the backend named by the configuration. Missing parent
 * directories of a SQLite file are created.
 */
export function createAdapter(
  config: Pick<AppConfig, "database" | "pool">,
): DatabaseAdapter {
  const { database } = config;
  switch (database.kind) {
    case "sqlite":
      if (database.filename !== ":memory:") {
        mkdirSync(dirname(database.filename), { recursive: true });
      }
      return new SqliteAdapter(database.filename);
    case "postgres":
      return PostgresAdapter.connect({
        connectionString: database.connectionString,
        max: config.pool.max,
        connectionTimeoutMillis: config.pool.connectionTimeoutMillis,
      });
  }
}
