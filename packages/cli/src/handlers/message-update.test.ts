// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@chatvault/core", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@chatvault/core")>();
  return { ...actual, withDatabase: vi.fn() };
});

import { MessageRepository, type SqliteAdapter } from "@chatvault/core";
import { seedChat, seedMessage } from "@chatvault/core/testing";

import { handleMessageUpdate } from "./message-update.js";
import {
  captureOutput,
  type CapturedOutput,
  useTestArchive,
} from "./testing/archive-harness.js";

describe("handleMessageUpdate", () => {
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

  it("updates the given fields only", async () => {
    const chat = await seedChat(db, { name: "News", slug: "news" });
    const id = await seedMessage(db, chat.id, {
      timestamp: "2024-06-01T10:00:00Z",
      text: "draft",
      notes: "keep me",
    });

    await handleMessageUpdate(id, { text: "final" });

    expect(output.stdout()).toBe(`Message #${String(id)} updated\n`);
    expect(await new MessageRepository(db).getById(id)).toMatchObject({
      timestamp: "2024-06-01T10:00:00Z",
      text: "final",
      notes: "keep me",
    });
  });

  it("reports an unknown id", async () => {
    await handleMessageUpdate(99, { text: "x" });

    expect(process.exitCode).toBe(1);
    expect(output.stderr()).toBe("Message not found for id 99.\n");
  });
});
