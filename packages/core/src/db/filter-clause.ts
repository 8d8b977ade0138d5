// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import type { DateRange, FilterCriteria } from "../types/index.js";
import { dayBounds } from "../utils/time.js";
import type { SqlDialect, SqlFragment, SqlParam } from "./adapter.js";

function dateCondition(range: DateRange, dialect: SqlDialect): SqlFragment {
  const column = dialect.timestamp("m.timestamp");
  const param = dialect.timestampParam();
  switch (range.mode) {
    case "on": {
      const { start, end } = dayBounds(range.date);
      return {
        sql: `${column} BETWEEN ${param} AND ${param}`,
        params: [start, end],
      };
    }
    case "before":
      return {
        sql: `${column} < ${param}`,
        params: [dayBounds(range.date).start],
      };
    case "after":
      return {
        sql: `${column} > ${param}`,
        params: [dayBounds(range.date).end],
      };
    case "between":
      return {
        sql: `${column} BETWEEN ${param} AND ${param}`,
        params: [dayBounds(range.start).start, dayBounds(range.end).end],
      };
  }
}

function criteriaCondition(
  criteria: FilterCriteria,
  dialect: SqlDialect,
): SqlFragment {
  switch (criteria.kind) {
    case "search":
      return dialect.textContains(
        "m.text",
        criteria.query,
        criteria.caseSensitive,
      );
    case "tag":
      return dialect.tagContains("m.tags", criteria.tag);
    case "date":
      return dateCondition(criteria.range, dialect);
  }
}

/**
 * Render the WHERE clause for a validated filter, optionally scoped to
 * one chat. Messages are aliased `m`, chats `c`. Every user value is a
 * bound parameter.
 */
export function buildMessageWhereClause(
  criteria: FilterCriteria | null,
  dialect: SqlDialect,
  chatSlug: string | null = null,
): SqlFragment {
  const conditions: string[] = [];
  const params: SqlParam[] = [];

  if (criteria !== null) {
    const condition = criteriaCondition(criteria, dialect);
    conditions.push(`(${condition.sql})`);
    params.push(...condition.params);
  }
  if (chatSlug !== null) {
    conditions.push("c.slug = ?");
    params.push(chatSlug);
  }

  return {
    sql: conditions.length === 0 ? "" : `WHERE ${conditions.join(" AND ")}`,
    params,
  };
}
