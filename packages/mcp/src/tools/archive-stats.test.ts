// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@chatvault/core", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@chatvault/core")>();
  return { ...actual, withDatabase: vi.fn() };
});

import type { SqliteAdapter } from "@chatvault/core";
import { seedChat, seedMessage } from "@chatvault/core/testing";

import { registerArchiveStats } from "./archive-stats.js";
import { resultText, useTestArchive } from "./testing/archive-harness.js";
import { createMockServer } from "./testing/mock-server.js";

describe("registerArchiveStats", () => {
  let db: SqliteAdapter;

  beforeEach(async () => {
    vi.clearAllMocks();
    db = await useTestArchive();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await db.close();
  });

  it("registers a tool named archive-stats", () => {
    const { server } = createMockServer();
    registerArchiveStats(server);

    expect(server.tool).toHaveBeenCalledWith(
      "archive-stats",
      expect.any(String),
      expect.any(Object),
      expect.any(Function),
    );
  });

  it("returns totals as JSON", async () => {
    const { server, getHandler } = createMockServer();
    registerArchiveStats(server);
    const news = await seedChat(db, { name: "News", slug: "news" });
    await seedChat(db, { name: "Quiet", slug: "quiet" });
    await seedMessage(db, news.id, {
      timestamp: "2024-05-01T09:00:00Z",
      media: ["a.png"],
    });
    await seedMessage(db, news.id, { timestamp: "2024-05-02T18:45:00Z" });

    const result = await getHandler("archive-stats")({});

    const parsed: unknown = JSON.parse(resultText(result));
    expect(parsed).toMatchObject({
      totalChats: 2,
      totalMessages: 2,
      mediaMessages: 1,
      mostActiveChat: { name: "News", slug: "news", messageCount: 2 },
      lastMessage: {
        id: 2,
        timestamp: "2024-05-02T18:45:00Z",
        chatName: "News",
      },
    });
  });

  it("returns error on database failure", async () => {
    const { server, getHandler } = createMockServer();
    registerArchiveStats(server);
    await db.exec("DROP TABLE messages");

    const result = await getHandler("archive-stats")({});

    expect(result).toMatchObject({ isError: true });
    expect(resultText(result)).toMatch(
      /^Failed to compute archive stats: .*no such table: messages$/,
    );
  });
});
