// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { SqliteAdapter } from "../sqlite-adapter.js";
import {
  openTestDatabase,
  seedChat,
  seedMessage,
} from "../testing/open-test-database.js";
import { FilterRepository } from "./filter.js";

describe("FilterRepository", () => {
  let db: SqliteAdapter;
  let repo: FilterRepository;
  let hello: number;
  let privit: number;
  let again: number;
  let discount: number;

  beforeEach(async () => {
    db = await openTestDatabase();
    repo = new FilterRepository(db);
    const news = await seedChat(db, { name: "News", slug: "news" });
    const other = await seedChat(db, { name: "Other", slug: "other" });
    hello = await seedMessage(db, news.id, {
      timestamp: "2024-05-01T09:00:00Z",
      text: "Hello World",
      tags: ["intro"],
    });
    privit = await seedMessage(db, news.id, {
      timestamp: "2024-05-02T12:30:00Z",
      text: "Привіт світ",
      tags: ["greeting", "intro"],
    });
    again = await seedMessage(db, other.id, {
      timestamp: "2024-05-03T00:00:00Z",
      text: "hello again",
      tags: ["greeting"],
    });
    discount = await seedMessage(db, other.id, { text: "Discount 100% off" });
  });

  afterEach(async () => {
    await db.close();
  });

  const ids = (rows: { id: number }[]): number[] => rows.map((r) => r.id);

  it("returns every message without criteria", async () => {
    const rows = await repo.fetchFiltered(null);

    expect(ids(rows)).toEqual([again, privit, hello, discount]);
  });

  describe("search", () => {
    it("ignores case by default", async () => {
      const rows = await repo.fetchFiltered({
        kind: "search",
        query: "HELLO",
        caseSensitive: false,
      });

      expect(ids(rows)).toEqual([again, hello]);
    });

    it("folds non-ASCII letters", async () => {
      const rows = await repo.fetchFiltered({
        kind: "search",
        query: "привіт",
        caseSensitive: false,
      });

      expect(ids(rows)).toEqual([privit]);
    });

    it("matches case when asked", async () => {
      const rows = await repo.fetchFiltered({
        kind: "search",
        query: "Hello",
        caseSensitive: true,
      });

      expect(ids(rows)).toEqual([hello]);
    });

    it("treats LIKE wildcards literally", async () => {
      const percent = await repo.fetchFiltered({
        kind: "search",
        query: "0%",
        caseSensitive: false,
      });
      const underscore = await repo.fetchFiltered({
        kind: "search",
        query: "_",
        caseSensitive: false,
      });

      expect(ids(percent)).toEqual([discount]);
      expect(underscore).toEqual([]);
    });

    it("scopes to one chat", async () => {
      const rows = await repo.fetchFiltered(
        { kind: "search", query: "hello", caseSensitive: false },
        "news",
      );

      expect(ids(rows)).toEqual([hello]);
      expect(rows[0]?.chatName).toBe("News");
    });
  });

  describe("tag", () => {
    it("matches whole tags", async () => {
      const rows = await repo.fetchFiltered({ kind: "tag", tag: "intro" });

      expect(ids(rows)).toEqual([privit, hello]);
    });

    it("does not match tag prefixes", async () => {
      expect(await repo.fetchFiltered({ kind: "tag", tag: "intr" })).toEqual(
        [],
      );
    });
  });

  describe("date", () => {
    it("selects one day", async () => {
      const rows = await repo.fetchFiltered({
        kind: "date",
        range: { mode: "on", date: "2024-05-02" },
      });

      expect(ids(rows)).toEqual([privit]);
    });

    it("selects before a day", async () => {
      const rows = await repo.fetchFiltered({
        kind: "date",
        range: { mode: "before", date: "2024-05-02" },
      });

      expect(ids(rows)).toEqual([hello]);
    });

    it("selects after a day", async () => {
      const rows = await repo.fetchFiltered({
        kind: "date",
        range: { mode: "after", date: "2024-05-02" },
      });

      expect(ids(rows)).toEqual([again]);
    });

    it("selects an inclusive range", async () => {
      const rows = await repo.fetchFiltered(
        {
          kind: "date",
          range: { mode: "between", start: "2024-05-01", end: "2024-05-02" },
        },
        null,
        "timestamp",
        "asc",
      );

      expect(ids(rows)).toEqual([hello, privit]);
    });
  });
});
