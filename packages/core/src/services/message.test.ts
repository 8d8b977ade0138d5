// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  ChatNotFoundError,
  DuplicateMessageError,
  MessageNotFoundError,
} from "../db/errors.js";
import type { SqliteAdapter } from "../db/sqlite-adapter.js";
import {
  openTestDatabase,
  seedChat,
  seedMessage,
} from "../db/testing/open-test-database.js";
import type { Chat } from "../types/index.js";
import { ValidationError } from "./errors.js";
import { MessageService, validateMessageInput } from "./message.js";

const clock = {
  timeZone: "Europe/Kyiv",
  now: () => new Date("2024-06-15T12:00:00Z"),
};

describe("validateMessageInput", () => {
  it("reads naive timestamps in the configured zone", () => {
    expect(
      validateMessageInput(
        3,
        {
          msgId: " 17 ",
          timestamp: "2024-06-15 10:00",
          text: "  line one\r\nline two ",
          tags: "a, b",
          media: ["x.png", "x.png"],
        },
        clock,
      ),
    ).toEqual({
      chatRefId: 3,
      msgId: 17,
      timestamp: "2024-06-15T07:00:00Z",
      link: null,
      text: "line one\nline two",
      media: ["x.png"],
      screenshot: null,
      tags: ["a", "b"],
      notes: null,
    });
  });

  it("accepts day-first dates and Date objects", () => {
    expect(
      validateMessageInput(1, { timestamp: "15.06.2024 14:30", text: "x" }, clock)
        .timestamp,
    ).toBe("2024-06-15T11:30:00Z");
    expect(
      validateMessageInput(
        1,
        { timestamp: new Date("2024-06-01T08:15:30.900Z"), text: "x" },
        clock,
      ).timestamp,
    ).toBe("2024-06-01T08:15:30Z");
  });

  it("collects every failing field", () => {
    let caught: unknown;
    try {
      validateMessageInput(
        1,
        { msgId: "-3", text: " ", link: "example.com", timestamp: "" },
        clock,
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      errors: {
        text: "Text cannot be empty or whitespace.",
        msgId: "Message ID must be a positive integer.",
        link: "Please enter a valid URL (starting with http:// or https://).",
        timestamp: "Date and time are required.",
      },
    });
  });

  it("rejects unparseable timestamps", () => {
    expect(() =>
      validateMessageInput(1, { timestamp: "yesterday", text: "x" }, clock),
    ).toThrow("Invalid date and time format.");
    expect(() =>
      validateMessageInput(
        1,
        { timestamp: new Date("not a date"), text: "x" },
        clock,
      ),
    ).toThrow("Invalid date and time format.");
  });

  it("rejects future timestamps after zone conversion", () => {
    expect(() =>
      validateMessageInput(
        1,
        { timestamp: "2024-06-15 15:30", text: "x" },
        clock,
      ),
    ).toThrow("Date and time cannot be in the future.");
    expect(
      validateMessageInput(
        1,
        { timestamp: "2024-06-15 15:00", text: "x" },
        clock,
      ).timestamp,
    ).toBe("2024-06-15T12:00:00Z");
  });
});

describe("MessageService", () => {
  let db: SqliteAdapter;
  let service: MessageService;
  let chat: Chat;

  beforeEach(async () => {
    db = await openTestDatabase();
    service = new MessageService(db, clock);
    chat = await seedChat(db, { name: "News", slug: "news" });
  });

  afterEach(async () => {
    await db.close();
  });

  describe("listByChat", () => {
    it("lists the chat's messages newest first", async () => {
      const older = await seedMessage(db, chat.id, {
        timestamp: "2024-06-01T00:00:00Z",
      });
      const newer = await seedMessage(db, chat.id, {
        timestamp: "2024-06-02T00:00:00Z",
      });

      const rows = await service.listByChat("news");

      expect(rows.map((r) => r.id)).toEqual([newer, older]);
      expect(rows[0]?.chatName).toBe("News");
    });

    it("throws for an unknown chat", async () => {
      await expect(service.listByChat("missing")).rejects.toThrow(
        ChatNotFoundError,
      );
    });
  });

  describe("get", () => {
    it("returns neighbours within the chat", async () => {
      const other = await seedChat(db, { name: "Other", slug: "other" });
      const first = await seedMessage(db, chat.id, {
        timestamp: "2024-06-01T00:00:00Z",
      });
      const middle = await seedMessage(db, chat.id, {
        timestamp: "2024-06-02T00:00:00Z",
      });
      await seedMessage(db, other.id, { timestamp: "2024-06-02T12:00:00Z" });
      const last = await seedMessage(db, chat.id, {
        timestamp: "2024-06-03T00:00:00Z",
      });

      const detail = await service.get(middle);

      expect(detail.message.id).toBe(middle);
      expect(detail.previousId).toBe(first);
      expect(detail.nextId).toBe(last);
      expect((await service.get(first)).previousId).toBeNull();
      expect((await service.get(last)).nextId).toBeNull();
    });

    it("gives undated messages no neighbours", async () => {
      await seedMessage(db, chat.id, { timestamp: "2024-06-01T00:00:00Z" });
      const undated = await seedMessage(db, chat.id, { text: "?" });

      expect(await service.get(undated)).toMatchObject({
        previousId: null,
        nextId: null,
      });
    });

    it("throws for an unknown id", async () => {
      await expect(service.get(99)).rejects.toThrow(
        "Message not found for id 99",
      );
    });
  });

  describe("create", () => {
    it("stores the validated message", async () => {
      const created = await service.create("news", {
        msgId: 5,
        timestamp: "2024-06-15 10:00",
        text: "hello",
      });

      expect(created).toMatchObject({
        chatRefId: chat.id,
        msgId: 5,
        timestamp: "2024-06-15T07:00:00Z",
      });
      expect((await service.get(created.id)).message).toEqual(created);
    });

    it("rejects a repeated message id in the chat", async () => {
      const input = { msgId: 5, timestamp: "2024-06-15 10:00", text: "x" };
      await service.create("news", input);

      await expect(service.create("news", input)).rejects.toThrow(
        DuplicateMessageError,
      );
    });

    it("requires an existing chat", async () => {
      await expect(
        service.create("missing", { timestamp: "2024-06-15", text: "x" }),
      ).rejects.toThrow('Chat not found for slug "missing"');
    });
  });

  describe("update", () => {
    it("keeps fields not given", async () => {
      const created = await service.create("news", {
        timestamp: "2024-06-10T09:00:00Z",
        text: "hello",
        tags: ["a"],
      });

      const updated = await service.update(created.id, {
        text: "edited",
        tags: null,
      });

      expect(updated).toEqual({
        ...created,
        text: "edited",
        tags: [],
      });
      expect((await service.get(created.id)).message).toEqual(updated);
    });

    it("validates the merged fields", async () => {
      const created = await service.create("news", {
        timestamp: "2024-06-10T09:00:00Z",
        text: "hello",
      });

      await expect(service.update(created.id, { text: "" })).rejects.toThrow(
        "Text cannot be empty or whitespace.",
      );
    });
  });

  describe("delete", () => {
    it("returns the removed message", async () => {
      const created = await service.create("news", {
        timestamp: "2024-06-10T09:00:00Z",
        text: "bye",
      });

      await expect(service.delete(created.id)).resolves.toEqual(created);
      await expect(service.get(created.id)).rejects.toThrow(
        MessageNotFoundError,
      );
    });
  });
});
