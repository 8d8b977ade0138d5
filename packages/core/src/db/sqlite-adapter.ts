// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import Database from "better-sqlite3";

import { getLogger } from "../logging.js";
import type {
  DatabaseAdapter,
  QueryExecutor,
  SqlDialect,
  SqlParam,
  SqlRow,
  UniqueViolation,
} from "./adapter.js";
import { containsPattern, LIKE_ESCAPE } from "./escape-like.js";

const log = getLogger("sqlite");

const UNIQUE_CODES = new Set([
  "SQLITE_CONSTRAINT_UNIQUE",
  "SQLITE_CONSTRAINT_PRIMARYKEY",
]);

/**
 * Timestamps are stored as canonical UTC text and compared through
 * `datetime()`. `casefold()` is registered on every connection because
 * SQLite's own `lower()` and `LIKE` only fold ASCII.
 */
export const sqliteDialect: SqlDialect = {
  name: "sqlite",
  timestamp: (column) => `datetime(${column})`,
  timestampParam: () => "datetime(?)",
  textContains: (column, value, caseSensitive) =>
    caseSensitive
      ? { sql: `instr(${column}, ?) > 0`, params: [value] }
      : {
          sql: `casefold(${column}) LIKE ? ${LIKE_ESCAPE}`,
          params: [containsPattern(value.toLowerCase())],
        },
  tagContains: (column, tag) => ({
    sql:
      `CASE WHEN json_valid(${column}) THEN ` +
      `EXISTS (SELECT 1 FROM json_each(${column}) WHERE json_each.value = ?) ` +
      "ELSE 0 END",
    params: [tag],
  }),
  nonEmptyArray: (column) =>
    `CASE WHEN json_valid(${column}) THEN json_array_length(${column}) > 0 ELSE 0 END`,
};

function casefold(value: unknown): unknown {
  return typeof value === "string" ? value.toLowerCase() : value;
}

/**
 * Recognise a unique violation raised by better-sqlite3, e.g.
 * `UNIQUE constraint failed: messages.chat_ref_id, messages.msg_id`.
 */
export function sqliteUniqueViolation(error: unknown): UniqueViolation | null {
  if (
    !(error instanceof Error) ||
    !("code" in error) ||
    typeof error.code !== "string" ||
    !UNIQUE_CODES.has(error.code)
  ) {
    return null;
  }
  const detail = /constraint failed: (.+)$/.exec(error.message)?.[1] ?? "";
  const index = /^index '(.+)'$/.exec(detail);
  if (index !== null) {
    return { constraint: index[1] ?? null, columns: [] };
  }
  return {
    constraint: null,
    columns: detail
      .split(",")
      .map((column) => column.trim())
      .filter((column) => column !== ""),
  };
}

export interface SqliteAdapterOptions {
  /** Open the file read-only. Defaults to false. */
  readonly?: boolean;
}

/**
 * SQLite backend on a single better-sqlite3 connection.
 *
 * Statements run synchronously; the async surface matches the
 * PostgreSQL adapter. Foreign keys are enforced on open.
 */
export class SqliteAdapter implements DatabaseAdapter {
  readonly dialect = sqliteDialect;
  private readonly db: Database.Database;
  private transactionDepth = 0;

  constructor(filename: string, options: SqliteAdapterOptions = {}) {
    this.db = new Database(filename, { readonly: options.readonly ?? false });
    this.db.pragma("foreign_keys = ON");
    this.db.function("casefold", { deterministic: true }, casefold);
    log.debug({ filename }, "Opened SQLite database");
  }

  async selectOne<T extends SqlRow>(
    sql: string,
    params: readonly SqlParam[] = [],
  ): Promise<T | undefined> {
    return this.db.prepare<SqlParam[], T>(sql).get(...params);
  }

  async selectAll<T extends SqlRow>(
    sql: string,
    params: readonly SqlParam[] = [],
  ): Promise<T[]> {
    return this.db.prepare<SqlParam[], T>(sql).all(...params);
  }

  async execute(sql: string, params: readonly SqlParam[] = []): Promise<number> {
    return this.db.prepare<SqlParam[]>(sql).run(...params).changes;
  }

  async insert(
    sql: string,
    params: readonly SqlParam[] = [],
  ): Promise<number | null> {
    const result = this.db.prepare<SqlParam[]>(sql).run(...params);
    return result.changes > 0 ? Number(result.lastInsertRowid) : null;
  }

  async transaction<T>(work: (tx: QueryExecutor) => Promise<T>): Promise<T> {
    if (this.transactionDepth > 0) {
      return work(this);
    }
    this.db.exec("BEGIN");
    this.transactionDepth++;
    try {
      const result = await work(this);
      this.db.exec("COMMIT");
      return result;
    } catch (error) {
      if (this.db.inTransaction) {
        this.db.exec("ROLLBACK");
      }
      log.debug({ err: error }, "Transaction rolled back");
      throw error;
    } finally {
      this.transactionDepth--;
    }
  }

  uniqueViolation(error: unknown): UniqueViolation | null {
    return sqliteUniqueViolation(error);
  }

  async exec(script: string): Promise<void> {
    this.db.exec(script);
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}
