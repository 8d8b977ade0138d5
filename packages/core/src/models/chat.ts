// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { DatabaseError } from "../db/errors.js";
import type { Chat, ChatDraft, ChatInput, ChatSummary } from "../types/index.js";
import { tryParseUtcTimestamp } from "../utils/time.js";
import {
  emptyToNull,
  parseJoined,
  toBool,
  toIntOrNull,
} from "./normalize.js";

/**
 * Storage form of a chat, keyed by column name.
 */
export interface ChatRecord {
  slug: string;
  chat_id: number | null;
  name: string;
  link: string | null;
  type: string | null;
  image: string | null;
  joined: string | null;
  is_active: 0 | 1;
  is_member: 0 | 1;
  is_public: 0 | 1;
  notes: string | null;
}

type Row = Readonly<Record<string, unknown>>;

function normalizeChat(
  fields: Readonly<Record<keyof ChatInput, unknown>>,
): ChatDraft {
  return {
    name: emptyToNull(fields.name) ?? "",
    chatId: toIntOrNull(fields.chatId),
    link: emptyToNull(fields.link),
    type: emptyToNull(fields.type),
    image: emptyToNull(fields.image),
    joined: parseJoined(fields.joined),
    isActive: toBool(fields.isActive),
    isMember: toBool(fields.isMember),
    isPublic: toBool(fields.isPublic),
    notes: emptyToNull(fields.notes),
  };
}

export function requireRowId(value: unknown, table: string): number {
  const id = toIntOrNull(value);
  if (id === null) {
    throw new DatabaseError(`Row from ${table} has no integer id`);
  }
  return id;
}

export function parseChatInput(input: ChatInput): ChatDraft {
  return normalizeChat({
    name: input.name,
    chatId: input.chatId,
    link: input.link,
    type: input.type,
    image: input.image,
    joined: input.joined,
    isActive: input.isActive,
    isMember: input.isMember,
    isPublic: input.isPublic,
    notes: input.notes,
  });
}

export function parseChatRow(row: Row): Chat {
  return {
    id: requireRowId(row["id"], "chats"),
    slug: emptyToNull(row["slug"]) ?? "",
    ...normalizeChat({
      name: row["name"],
      chatId: row["chat_id"],
      link: row["link"],
      type: row["type"],
      image: row["image"],
      joined: row["joined"],
      isActive: row["is_active"],
      isMember: row["is_member"],
      isPublic: row["is_public"],
      notes: row["notes"],
    }),
  };
}

export function parseChatSummaryRow(row: Row): ChatSummary {
  return {
    ...parseChatRow(row),
    messageCount: toIntOrNull(row["message_count"]) ?? 0,
    lastMessageAt: tryParseUtcTimestamp(row["last_message"]),
  };
}

const flag = (value: boolean): 0 | 1 => (value ? 1 : 0);

export function chatToRecord(chat: Omit<Chat, "id">): ChatRecord {
  return {
    slug: chat.slug,
    chat_id: chat.chatId,
    name: chat.name,
    link: chat.link,
    type: chat.type,
    image: chat.image,
    joined: chat.joined,
    is_active: flag(chat.isActive),
    is_member: flag(chat.isMember),
    is_public: flag(chat.isPublic),
    notes: chat.notes,
  };
}

export function chatDisplayName(chat: Pick<Chat, "name" | "slug">): string {
  return `${chat.name} (${chat.slug})`;
}
