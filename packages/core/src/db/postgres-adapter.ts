// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import pg from "pg";
import type { Pool, QueryResult, QueryResultRow } from "pg";

import { getLogger } from "../logging.js";
import { toIntOrNull } from "../models/normalize.js";
import type {
  DatabaseAdapter,
  QueryExecutor,
  SqlDialect,
  SqlParam,
  SqlRow,
  UniqueViolation,
} from "./adapter.js";
import { containsPattern, LIKE_ESCAPE } from "./escape-like.js";

const log = getLogger("postgres");

const UNIQUE_VIOLATION = "23505";

/**
 * Timestamps are native `TIMESTAMPTZ`; tags and media are `JSONB`.
 */
export const postgresDialect: SqlDialect = {
  name: "postgres",
  timestamp: (column) => column,
  timestampParam: () => "CAST(? AS TIMESTAMPTZ)",
  textContains: (column, value, caseSensitive) => ({
    sql: `${column} ${caseSensitive ? "LIKE" : "ILIKE"} ? ${LIKE_ESCAPE}`,
    params: [containsPattern(value)],
  }),
  tagContains: (column, tag) => ({
    sql: `${column} @> jsonb_build_array(CAST(? AS TEXT))`,
    params: [tag],
  }),
  nonEmptyArray: (column) =>
    `CASE WHEN jsonb_typeof(${column}) = 'array' THEN jsonb_array_length(${column}) > 0 ELSE FALSE END`,
};

/**
 * Rewrite `?` placeholders to `$1..$n`, leaving quoted literals and
 * identifiers untouched.
 */
export function toPositionalParams(sql: string): string {
  let result = "";
  let position = 0;
  let quote: string | null = null;
  for (const char of sql) {
    if (quote !== null) {
      if (char === quote) {
        quote = null;
      }
      result += char;
    } else if (char === "'" || char === '"') {
      quote = char;
      result += char;
    } else if (char === "?") {
      position++;
      result += `$${String(position)}`;
    } else {
      result += char;
    }
  }
  return result;
}

/**
 * Recognise SQLSTATE 23505. Columns come from the error detail,
 * e.g. `Key (slug)=(news) already exists.`
 */
export function postgresUniqueViolation(
  error: unknown,
): UniqueViolation | null {
  if (
    !(error instanceof Error) ||
    !("code" in error) ||
    error.code !== UNIQUE_VIOLATION
  ) {
    return null;
  }
  const constraint =
    "constraint" in error && typeof error.constraint === "string"
      ? error.constraint
      : null;
  const table =
    "table" in error && typeof error.table === "string" ? error.table : null;
  const detail =
    "detail" in error && typeof error.detail === "string" ? error.detail : "";
  const keys = /^Key \(([^)]+)\)=/.exec(detail)?.[1] ?? "";
  const columns = keys
    .split(",")
    .map((column) => column.trim())
    .filter((column) => column !== "")
    .map((column) => (table === null ? column : `${table}.${column}`));
  return { constraint, columns };
}

/**
 * The part of `pg.Pool` and `pg.PoolClient` the executor needs.
 */
interface Queryable {
  query<R extends QueryResultRow>(
    text: string,
    values?: SqlParam[],
  ): Promise<QueryResult<R>>;
}

class PostgresExecutor implements QueryExecutor {
  readonly dialect = postgresDialect;

  constructor(private readonly target: Queryable) {}

  protected async run<R extends SqlRow>(
    sql: string,
    params: readonly SqlParam[],
  ): Promise<QueryResult<R>> {
    const text = toPositionalParams(sql);
    const start = Date.now();
    try {
      const result = await this.target.query<R>(text, [...params]);
      log.debug(
        { text, durationMs: Date.now() - start, rowCount: result.rowCount },
        "Query completed",
      );
      return result;
    } catch (error) {
      log.debug({ text, err: error }, "Query failed");
      throw error;
    }
  }

  async selectOne<T extends SqlRow>(
    sql: string,
    params: readonly SqlParam[] = [],
  ): Promise<T | undefined> {
    return (await this.run<T>(sql, params)).rows[0];
  }

  async selectAll<T extends SqlRow>(
    sql: string,
    params: readonly SqlParam[] = [],
  ): Promise<T[]> {
    return (await this.run<T>(sql, params)).rows;
  }

  async execute(sql: string, params: readonly SqlParam[] = []): Promise<number> {
    return (await this.run(sql, params)).rowCount ?? 0;
  }

  async insert(
    sql: string,
    params: readonly SqlParam[] = [],
  ): Promise<number | null> {
    const statement = `${sql.trim().replace(/;$/, "")} RETURNING id`;
    const result = await this.run(statement, params);
    return toIntOrNull(result.rows[0]?.["id"]);
  }

  async transaction<T>(work: (tx: QueryExecutor) => Promise<T>): Promise<T> {
    return work(this);
  }

  uniqueViolation(error: unknown): UniqueViolation | null {
    return postgresUniqueViolation(error);
  }
}

export interface PostgresAdapterOptions {
  connectionString: string;
  /** Pool size. */
  max?: number;
  connectionTimeoutMillis?: number;
}

/**
 * PostgreSQL backend on a `pg` pool.
 *
 * Single statements go through `pool.query`, which checks a client
 * out and releases it afterwards. A transaction holds one client from
 * `BEGIN` to `COMMIT`/`ROLLBACK`.
 */
export class PostgresAdapter
  extends PostgresExecutor
  implements DatabaseAdapter
{
  private readonly pool: Pool;

  constructor(pool: Pool) {
    super(pool);
    this.pool = pool;
    this.pool.on("error", (err) => {
      log.error({ err }, "Unexpected error on idle client");
    });
  }

  static connect(options: PostgresAdapterOptions): PostgresAdapter {
    return new PostgresAdapter(
      new pg.Pool({
        connectionString: options.connectionString,
        max: options.max ?? 10,
        connectionTimeoutMillis: options.connectionTimeoutMillis ?? 5000,
      }),
    );
  }

  override async transaction<T>(
    work: (tx: QueryExecutor) => Promise<T>,
  ): Promise<T> {
    const client = await this.pool.connect();
    // Set when ROLLBACK fails; the pool then discards the client.
    let broken: Error | undefined;
    try {
      await client.query("BEGIN");
      const result = await work(new PostgresExecutor(client));
      await client.query("COMMIT");
      return result;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
        log.debug({ err: error }, "Transaction rolled back");
      } catch (rollbackError) {
        log.error({ err: rollbackError, cause: error }, "Rollback failed");
        broken =
          rollbackError instanceof Error
            ? rollbackError
            : new Error(String(rollbackError));
      }
      throw error;
    } finally {
      client.release(broken);
    }
  }

  async exec(script: string): Promise<void> {
    await this.pool.query(script);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
