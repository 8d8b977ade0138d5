// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

/**
 * Value bound to a `?` placeholder. Booleans are bound as `0`/`1`.
 */
export type SqlParam = string | number | bigint | null;

export type SqlRow = Record<string, unknown>;

/**
 * A piece of SQL and the parameters its placeholders consume, in order.
 */
export interface SqlFragment {
  sql: string;
  params: SqlParam[];
}

export type DialectName = "sqlite" | "postgres";

/**
 * Backend-specific SQL expressions. Everything else in the data layer
 * is written once in the common subset of both dialects.
 */
export interface SqlDialect {
  readonly name: DialectName;
  /** Comparable form of a stored timestamp column. */
  timestamp(column: string): string;
  /** Placeholder for a bound UTC ISO timestamp. */
  timestampParam(): string;
  /** Substring match of `value` in a text column. */
  textContains(
    column: string,
    value: string,
    caseSensitive: boolean,
  ): SqlFragment;
  /** Exact membership of `tag` in a JSON array column. */
  tagContains(column: string, tag: string): SqlFragment;
  /** The JSON array column holds at least one element. */
  nonEmptyArray(column: string): string;
}

/**
 * Details of a unique-constraint violation recognised in a driver error.
 */
export interface UniqueViolation {
  /** Constraint or index name when the driver reports one. */
  constraint: string | null;
  /** `table.column` pairs when the driver reports them. */
  columns: string[];
}

/**
 * Statement execution shared by an open database and a transaction.
 * SQL uses `?` placeholders regardless of backend.
 */
export interface QueryExecutor {
  readonly dialect: SqlDialect;
  selectOne<T extends SqlRow>(
    sql: string,
    params?: readonly SqlParam[],
  ): Promise<T | undefined>;
  selectAll<T extends SqlRow>(
    sql: string,
    params?: readonly SqlParam[],
  ): Promise<T[]>;
  /** Runs DML and resolves to the number of affected rows. */
  execute(sql: string, params?: readonly SqlParam[]): Promise<number>;
  /** Runs an INSERT and resolves to the generated `id`, if any. */
  insert(sql: string, params?: readonly SqlParam[]): Promise<number | null>;
  /**
   * Runs `work` in one transaction, committing when it resolves and
   * rolling back when it rejects. Nested calls join the outer one.
   */
  transaction<T>(work: (tx: QueryExecutor) => Promise<T>): Promise<T>;
  uniqueViolation(error: unknown): UniqueViolation | null;
}

/**
 * An open connection (SQLite) or pool (PostgreSQL).
 */
export interface DatabaseAdapter extends QueryExecutor {
  /** Runs a script of one or more statements without parameters. */
  exec(script: string): Promise<void>;
  close(): Promise<void>;
}
