// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@chatvault/core", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@chatvault/core")>();
  return { ...actual, withDatabase: vi.fn() };
});

import { ChatRepository, type SqliteAdapter } from "@chatvault/core";

import { handleChatCreate } from "./chat-create.js";
import {
  captureOutput,
  type CapturedOutput,
  useTestArchive,
} from "./testing/archive-harness.js";

describe("handleChatCreate", () => {
  const originalExitCode = process.exitCode;
  let db: SqliteAdapter;
  let output: CapturedOutput;

  beforeEach(async () => {
    process.exitCode = undefined;
    vi.clearAllMocks();
    db = await useTestArchive();
    output = captureOutput();
  });

  afterEach(async () => {
    process.exitCode = originalExitCode;
    vi.restoreAllMocks();
    await db.close();
  });

  it("creates the chat and prints its slug", async () => {
    await handleChatCreate({
      name: "Daily News",
      chatId: "42",
      active: true,
      public: false,
    });

    expect(process.exitCode).toBeUndefined();
    expect(output.stdout()).toBe("Chat created: daily_news\n");
    expect(await new ChatRepository(db).getBySlug("daily_news")).toMatchObject(
      { chatId: 42, isActive: true, isPublic: false },
    );
  });

  it("prints JSON with --json", async () => {
    await handleChatCreate({ name: "News", json: true });

    const parsed: unknown = JSON.parse(output.stdout());
    expect(parsed).toMatchObject({ id: 1, slug: "news", name: "News" });
  });

  it("prints each validation failure", async () => {
    await handleChatCreate({
      name: "News",
      chatId: "abc",
      link: "example.com",
    });

    expect(process.exitCode).toBe(1);
    expect(output.stderr()).toBe(
      "chatId: Chat ID must be an integer.\n" +
        "link: Please enter a valid URL (starting with http:// or https://).\n",
    );
    expect(await new ChatRepository(db).list()).toEqual([]);
  });

  it("reports a duplicate chat id", async () => {
    await handleChatCreate({ name: "One", chatId: "7" });
    await handleChatCreate({ name: "Two", chatId: "7" });

    expect(process.exitCode).toBe(1);
    expect(output.stderr()).toBe("A chat with ID 7 already exists\n");
  });
});
