// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import type {
  Message,
  MessageDraft,
  MessageInput,
  MessageWithChat,
} from "../types/index.js";
import { tryParseUtcTimestamp } from "../utils/time.js";
import { requireRowId } from "./chat.js";
import {
  emptyToNull,
  normalizeText,
  parseMedia,
  parseTags,
  toIntOrNull,
} from "./normalize.js";

/**
 * Storage form of a message; `media` and `tags` are JSON array text.
 */
export interface MessageRecord {
  chat_ref_id: number;
  msg_id: number | null;
  timestamp: string | null;
  link: string | null;
  text: string | null;
  media: string;
  screenshot: string | null;
  tags: string;
  notes: string | null;
}

type Row = Readonly<Record<string, unknown>>;

function normalizeMessage(
  chatRefId: number,
  fields: Readonly<Record<keyof MessageInput, unknown>>,
): MessageDraft {
  return {
    chatRefId,
    msgId: toIntOrNull(fields.msgId),
    timestamp: tryParseUtcTimestamp(fields.timestamp),
    link: emptyToNull(fields.link),
    text: normalizeText(fields.text),
    media: parseMedia(fields.media),
    screenshot: emptyToNull(fields.screenshot),
    tags: parseTags(fields.tags),
    notes: emptyToNull(fields.notes),
  };
}

export function parseMessageInput(
  chatRefId: number,
  input: MessageInput,
): MessageDraft {
  return normalizeMessage(chatRefId, {
    msgId: input.msgId,
    timestamp: input.timestamp,
    link: input.link,
    text: input.text,
    media: input.media,
    screenshot: input.screenshot,
    tags: input.tags,
    notes: input.notes,
  });
}

export function parseMessageRow(row: Row): Message {
  return {
    id: requireRowId(row["id"], "messages"),
    ...normalizeMessage(requireRowId(row["chat_ref_id"], "messages"), {
      msgId: row["msg_id"],
      timestamp: row["timestamp"],
      link: row["link"],
      text: row["text"],
      media: row["media"],
      screenshot: row["screenshot"],
      tags: row["tags"],
      notes: row["notes"],
    }),
  };
}

export function parseMessageWithChatRow(row: Row): MessageWithChat {
  return {
    ...parseMessageRow(row),
    chatName: emptyToNull(row["chat_name"]) ?? "",
    chatSlug: emptyToNull(row["chat_slug"]) ?? "",
  };
}

export function messageToRecord(message: MessageDraft): MessageRecord {
  return {
    chat_ref_id: message.chatRefId,
    msg_id: message.msgId,
    timestamp: message.timestamp,
    link: message.link,
    text: message.text,
    media: JSON.stringify(message.media),
    screenshot: message.screenshot,
    tags: JSON.stringify(message.tags),
    notes: message.notes,
  };
}

/**
 * Single-line preview of the message body, cut at `limit` characters.
 */
export function messageShortText(
  message: Pick<Message, "text">,
  limit = 50,
): string {
  if (message.text === null) {
    return "";
  }
  const flat = message.text
    .split(/\s+/)
    .filter((word) => word !== "")
    .join(" ");
  return flat.length <= limit ? flat : `${flat.slice(0, limit)}...`;
}
