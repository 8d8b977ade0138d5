// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

export interface Message {
  id: number;
  chatRefId: number;
  /** Identifier on the source platform, unique within the chat. */
  msgId: number | null;
  /** UTC, `YYYY-MM-DDTHH:MM:SSZ`. */
  timestamp: string | null;
  link: string | null;
  text: string | null;
  /** Stored file references, deduplicated, in upload order. */
  media: string[];
  screenshot: string | null;
  tags: string[];
  notes: string | null;
}

export type MessageDraft = Omit<Message, "id">;

/**
 * A message row joined with the owning chat's display fields.
 */
export interface MessageWithChat extends Message {
  chatName: string;
  chatSlug: string;
}

/**
 * Loosely-typed message fields; normalized by `parseMessageInput`.
 */
export interface MessageInput {
  msgId?: string | number | null | undefined;
  timestamp?: string | Date | null | undefined;
  link?: string | null | undefined;
  text?: string | null | undefined;
  media?: string | readonly string[] | null | undefined;
  screenshot?: string | null | undefined;
  tags?: string | readonly string[] | null | undefined;
  notes?: string | null | undefined;
}

export type AdjacentDirection = "previous" | "next";

export interface MessageDetail {
  message: Message;
  previousId: number | null;
  nextId: number | null;
}
