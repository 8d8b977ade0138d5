// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { describe, expect, it } from "vitest";

import { buildMessageWhereClause } from "./filter-clause.js";
import { postgresDialect } from "./postgres-adapter.js";
import { sqliteDialect } from "./sqlite-adapter.js";

describe("buildMessageWhereClause", () => {
  describe("search", () => {
    it("folds case and escapes wildcards on SQLite", () => {
      expect(
        buildMessageWhereClause(
          { kind: "search", query: "50% OFF", caseSensitive: false },
          sqliteDialect,
        ),
      ).toEqual({
        sql: "WHERE (casefold(m.text) LIKE ? ESCAPE '\\')",
        params: ["%50\\% off%"],
      });
    });

    it("matches exact case with instr on SQLite", () => {
      expect(
        buildMessageWhereClause(
          { kind: "search", query: "Kyiv", caseSensitive: true },
          sqliteDialect,
        ),
      ).toEqual({ sql: "WHERE (instr(m.text, ?) > 0)", params: ["Kyiv"] });
    });

    it("uses ILIKE and LIKE on PostgreSQL", () => {
      expect(
        buildMessageWhereClause(
          { kind: "search", query: "Kyiv", caseSensitive: false },
          postgresDialect,
        ),
      ).toEqual({
        sql: "WHERE (m.text ILIKE ? ESCAPE '\\')",
        params: ["%Kyiv%"],
      });
      expect(
        buildMessageWhereClause(
          { kind: "search", query: "Kyiv", caseSensitive: true },
          postgresDialect,
        ).sql,
      ).toBe("WHERE (m.text LIKE ? ESCAPE '\\')");
    });
  });

  it("tests JSONB containment for tags on PostgreSQL", () => {
    expect(
      buildMessageWhereClause({ kind: "tag", tag: "event" }, postgresDialect),
    ).toEqual({
      sql: "WHERE (m.tags @> jsonb_build_array(CAST(? AS TEXT)))",
      params: ["event"],
    });
  });

  describe("date", () => {
    it("spans the whole day for 'on'", () => {
      expect(
        buildMessageWhereClause(
          { kind: "date", range: { mode: "on", date: "2025-01-15" } },
          sqliteDialect,
        ),
      ).toEqual({
        sql: "WHERE (datetime(m.timestamp) BETWEEN datetime(?) AND datetime(?))",
        params: ["2025-01-15T00:00:00Z", "2025-01-15T23:59:59Z"],
      });
    });

    it("compares against the start of day for 'before'", () => {
      expect(
        buildMessageWhereClause(
          { kind: "date", range: { mode: "before", date: "2025-01-15" } },
          postgresDialect,
        ),
      ).toEqual({
        sql: "WHERE (m.timestamp < CAST(? AS TIMESTAMPTZ))",
        params: ["2025-01-15T00:00:00Z"],
      });
    });

    it("compares against the end of day for 'after'", () => {
      expect(
        buildMessageWhereClause(
          { kind: "date", range: { mode: "after", date: "2025-01-15" } },
          postgresDialect,
        ),
      ).toEqual({
        sql: "WHERE (m.timestamp > CAST(? AS TIMESTAMPTZ))",
        params: ["2025-01-15T23:59:59Z"],
      });
    });

    it("composes a range with the chat scope", () => {
      expect(
        buildMessageWhereClause(
          {
            kind: "date",
            range: { mode: "between", start: "2025-01-01", end: "2025-01-31" },
          },
          sqliteDialect,
          "news",
        ),
      ).toEqual({
        sql: "WHERE (datetime(m.timestamp) BETWEEN datetime(?) AND datetime(?)) AND c.slug = ?",
        params: ["2025-01-01T00:00:00Z", "2025-01-31T23:59:59Z", "news"],
      });
    });
  });

  it("scopes to a chat without criteria", () => {
    expect(buildMessageWhereClause(null, sqliteDialect, "news")).toEqual({
      sql: "WHERE c.slug = ?",
      params: ["news"],
    });
  });

  it("renders nothing without criteria or scope", () => {
    expect(buildMessageWhereClause(null, postgresDialect)).toEqual({
      sql: "",
      params: [],
    });
  });
});
