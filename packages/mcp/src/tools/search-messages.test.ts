// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@chatvault/core", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@chatvault/core")>();
  return { ...actual, withDatabase: vi.fn() };
});

import type { SqliteAdapter } from "@chatvault/core";
import { seedChat, seedMessage } from "@chatvault/core/testing";

import { registerSearchMessages } from "./search-messages.js";
import { resultText, useTestArchive } from "./testing/archive-harness.js";
import { createMockServer } from "./testing/mock-server.js";

describe("registerSearchMessages", () => {
  let db: SqliteAdapter;

  beforeEach(async () => {
    vi.clearAllMocks();
    db = await useTestArchive();
    const news = await seedChat(db, { name: "News", slug: "news" });
    const other = await seedChat(db, { name: "Other", slug: "other" });
    await seedMessage(db, news.id, {
      timestamp: "2024-05-01T09:00:00Z",
      text: "Hello World",
      tags: ["intro"],
    });
    await seedMessage(db, other.id, {
      timestamp: "2024-05-03T00:00:00Z",
      text: "hello again",
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await db.close();
  });

  function search(args: Record<string, unknown>): Promise<unknown> {
    const { server, getHandler } = createMockServer();
    registerSearchMessages(server);
    return getHandler("search-messages")(args);
  }

  it("registers a tool named search-messages", () => {
    const { server } = createMockServer();
    registerSearchMessages(server);

    expect(server.tool).toHaveBeenCalledWith(
      "search-messages",
      expect.any(String),
      expect.any(Object),
      expect.any(Function),
    );
  });

  it("infers a text search from the query", async () => {
    const result = await search({ query: "hello" });

    const parsed: unknown = JSON.parse(resultText(result));
    expect(parsed).toMatchObject({
      status: "valid",
      total: 2,
      messages: [{ text: "hello again" }, { text: "Hello World" }],
    });
  });

  it("honours case sensitivity", async () => {
    const result = await search({ query: "Hello", caseSensitive: true });

    const parsed: unknown = JSON.parse(resultText(result));
    expect(parsed).toMatchObject({
      total: 1,
      messages: [{ text: "Hello World", chatSlug: "news" }],
    });
  });

  it("limits results to one chat", async () => {
    const result = await search({ query: "hello", chatSlug: "news" });

    const parsed: unknown = JSON.parse(resultText(result));
    expect(parsed).toMatchObject({ total: 1, messages: [{ chatSlug: "news" }] });
  });

  it("filters by exact tag", async () => {
    const result = await search({ tag: "intro" });

    const parsed: unknown = JSON.parse(resultText(result));
    expect(parsed).toMatchObject({
      total: 1,
      messages: [{ text: "Hello World", tags: ["intro"] }],
    });
  });

  it("filters by date range", async () => {
    const result = await search({
      dateMode: "between",
      startDate: "2024-05-02",
      endDate: "2024-05-31",
    });

    const parsed: unknown = JSON.parse(resultText(result));
    expect(parsed).toMatchObject({
      total: 1,
      messages: [{ text: "hello again" }],
    });
  });

  it("reports empty filters without error", async () => {
    const result = await search({});

    const parsed: unknown = JSON.parse(resultText(result));
    expect(parsed).toEqual({
      status: "empty",
      message: "No filters or search query applied.",
      messages: [],
      total: 0,
    });
  });

  it("returns error for an inverted date range", async () => {
    const result = await search({
      dateMode: "between",
      startDate: "2024-05-31",
      endDate: "2024-05-01",
    });

    expect(result).toEqual({
      isError: true,
      content: [
        {
          type: "text",
          text: "Start date must be before or equal to end date.",
        },
      ],
    });
  });

  it("returns error for a search action without a query", async () => {
    const result = await search({ action: "search" });

    expect(result).toEqual({
      isError: true,
      content: [
        {
          type: "text",
          text: "Please enter a search query or select a date filter.",
        },
      ],
    });
  });
});
