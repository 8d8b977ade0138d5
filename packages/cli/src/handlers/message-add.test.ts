// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@chatvault/core", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@chatvault/core")>();
  return { ...actual, withDatabase: vi.fn() };
});

import { MessageRepository, type SqliteAdapter } from "@chatvault/core";
import { seedChat } from "@chatvault/core/testing";

import { handleMessageAdd } from "./message-add.js";
import {
  captureOutput,
  type CapturedOutput,
  useTestArchive,
} from "./testing/archive-harness.js";

describe("handleMessageAdd", () => {
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

  beforeEach(async () => {
    await seedChat(db, { name: "News", slug: "news" });
  });

  it("adds the message", async () => {
    await handleMessageAdd("news", {
      timestamp: "2024-06-10 09:30",
      text: "hello",
      tags: "a, b",
      msgId: "5",
    });

    expect(process.exitCode).toBeUndefined();
    expect(output.stdout()).toBe("Message #1 added to news\n");
    expect(await new MessageRepository(db).getById(1)).toMatchObject({
      msgId: 5,
      timestamp: "2024-06-10T09:30:00Z",
      tags: ["a", "b"],
    });
  });

  it("prints JSON with --json", async () => {
    await handleMessageAdd("news", {
      timestamp: "2024-06-10",
      text: "hello",
      json: true,
    });

    const parsed: unknown = JSON.parse(output.stdout());
    expect(parsed).toMatchObject({ id: 1, timestamp: "2024-06-10T00:00:00Z" });
  });

  it("prints each validation failure", async () => {
    await handleMessageAdd("news", {
      timestamp: "2024-06-16 00:00",
      text: "  ",
    });

    expect(process.exitCode).toBe(1);
    expect(output.stderr()).toBe(
      "text: Text cannot be empty or whitespace.\n" +
        "timestamp: Date and time cannot be in the future.\n",
    );
  });

  it("reports a repeated message id", async () => {
    const fields = { msgId: "5", timestamp: "2024-06-10", text: "x" };
    await handleMessageAdd("news", fields);
    await handleMessageAdd("news", fields);

    expect(process.exitCode).toBe(1);
    expect(output.stderr()).toBe("Message 5 already exists in chat 1\n");
  });
});
