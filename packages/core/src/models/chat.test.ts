// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { describe, expect, it } from "vitest";

import { DatabaseError } from "../db/errors.js";
import type { Chat } from "../types/index.js";
import {
  chatDisplayName,
  chatToRecord,
  parseChatInput,
  parseChatRow,
  parseChatSummaryRow,
} from "./chat.js";

const CHAT: Chat = {
  id: 5,
  slug: "kyiv_digital_hub",
  name: "Kyiv Digital Hub",
  chatId: -1001234567890,
  link: "https://t.me/kyivhub",
  type: "group",
  image: "chats/kyiv.png",
  joined: "2023-09-01",
  isActive: true,
  isMember: false,
  isPublic: true,
  notes: null,
};

describe("parseChatInput", () => {
  it("normalizes loose input", () => {
    expect(
      parseChatInput({
        name: "  Team ",
        chatId: " 42 ",
        link: "",
        joined: "2024-01-02",
        isActive: "on",
        isMember: "0",
        notes: "   ",
      }),
    ).toEqual({
      name: "Team",
      chatId: 42,
      link: null,
      type: null,
      image: null,
      joined: "2024-01-02",
      isActive: true,
      isMember: false,
      isPublic: false,
      notes: null,
    });
  });

  it("drops an invalid chat id instead of failing", () => {
    expect(parseChatInput({ name: "x", chatId: "abc" }).chatId).toBeNull();
  });
});

describe("parseChatRow", () => {
  it("round-trips through the storage record", () => {
    const { id, ...rest } = CHAT;
    expect(parseChatRow({ ...chatToRecord(rest), id })).toEqual(CHAT);
  });

  it("applies the same normalization as input parsing", () => {
    const row = {
      id: "3",
      slug: "team",
      name: " Team ",
      chat_id: "42",
      link: " ",
      type: null,
      image: null,
      joined: null,
      is_active: 1,
      is_member: true,
      is_public: 0,
      notes: "",
    };
    const { id, slug, ...fields } = parseChatRow(row);
    expect(id).toBe(3);
    expect(slug).toBe("team");
    expect(fields).toEqual(
      parseChatInput({
        name: " Team ",
        chatId: "42",
        link: " ",
        isActive: 1,
        isMember: true,
        isPublic: 0,
        notes: "",
      }),
    );
  });

  it("rejects rows without an id", () => {
    expect(() => parseChatRow({ slug: "x", name: "x" })).toThrow(DatabaseError);
  });
});

describe("parseChatSummaryRow", () => {
  it("adds the aggregate columns", () => {
    const { id, ...rest } = CHAT;
    const summary = parseChatSummaryRow({
      ...chatToRecord(rest),
      id,
      message_count: "12",
      last_message: "2025-01-01T10:00:00Z",
    });
    expect(summary.messageCount).toBe(12);
    expect(summary.lastMessageAt).toBe("2025-01-01T10:00:00Z");
  });

  it("defaults missing aggregates", () => {
    const summary = parseChatSummaryRow({ id: 1, slug: "a", name: "A" });
    expect(summary.messageCount).toBe(0);
    expect(summary.lastMessageAt).toBeNull();
  });
});

describe("chatToRecord", () => {
  it("stores booleans as integers", () => {
    const { id: _id, ...rest } = CHAT;
    const record = chatToRecord(rest);
    expect(record.is_active).toBe(1);
    expect(record.is_member).toBe(0);
    expect(record.chat_id).toBe(-1001234567890);
  });
});

describe("chatDisplayName", () => {
  it("combines name and slug", () => {
    expect(chatDisplayName(CHAT)).toBe("Kyiv Digital Hub (kyiv_digital_hub)");
  });
});
