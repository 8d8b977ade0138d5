// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@chatvault/core", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@chatvault/core")>();
  return { ...actual, withDatabase: vi.fn() };
});

import type { SqliteAdapter } from "@chatvault/core";
import { seedChat, seedMessage } from "@chatvault/core/testing";

import { registerListChats } from "./list-chats.js";
import { resultText, useTestArchive } from "./testing/archive-harness.js";
import { createMockServer } from "./testing/mock-server.js";

describe("registerListChats", () => {
  let db: SqliteAdapter;

  beforeEach(async () => {
    vi.clearAllMocks();
    db = await useTestArchive();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await db.close();
  });

  it("registers a tool named list-chats", () => {
    const { server } = createMockServer();
    registerListChats(server);

    expect(server.tool).toHaveBeenCalledOnce();
    expect(server.tool).toHaveBeenCalledWith(
      "list-chats",
      expect.any(String),
      expect.any(Object),
      expect.any(Function),
    );
  });

  it("returns chats as JSON, most recently active first", async () => {
    const { server, getHandler } = createMockServer();
    registerListChats(server);
    const news = await seedChat(db, { name: "News", slug: "news" });
    await seedChat(db, { name: "Alpha", slug: "alpha" });
    await seedMessage(db, news.id, { timestamp: "2024-05-01T09:00:00Z" });

    const result = await getHandler("list-chats")({});

    const parsed: unknown = JSON.parse(resultText(result));
    expect(parsed).toMatchObject({
      chats: [
        {
          slug: "news",
          messageCount: 1,
          lastMessageAt: "2024-05-01T09:00:00Z",
        },
        { slug: "alpha", messageCount: 0, lastMessageAt: null },
      ],
      total: 2,
    });
  });

  it("sorts by name", async () => {
    const { server, getHandler } = createMockServer();
    registerListChats(server);
    const news = await seedChat(db, { name: "News", slug: "news" });
    await seedChat(db, { name: "Alpha", slug: "alpha" });
    await seedMessage(db, news.id);

    const result = await getHandler("list-chats")({
      sortBy: "name",
      order: "asc",
    });

    const parsed: unknown = JSON.parse(resultText(result));
    expect(parsed).toMatchObject({
      chats: [{ slug: "alpha" }, { slug: "news" }],
    });
  });

  it("rejects an unknown sort field", () => {
    const { server, getSchema } = createMockServer();
    registerListChats(server);

    expect(
      getSchema("list-chats").safeParse({ sortBy: "slug" }).success,
    ).toBe(false);
  });

  it("returns error on database failure", async () => {
    const { server, getHandler } = createMockServer();
    registerListChats(server);
    await db.exec("DROP TABLE messages");

    const result = await getHandler("list-chats")({});

    expect(result).toMatchObject({ isError: true });
    expect(resultText(result)).toMatch(
      /^Failed to list chats: .*no such table: messages$/,
    );
  });
});
