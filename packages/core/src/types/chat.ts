// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

/**
 * An archived conversation. `slug` is the stable URL-safe key derived
 * from the name; `chatId` is the identifier on the source platform.
 */
export interface Chat {
  id: number;
  slug: string;
  name: string;
  chatId: number | null;
  link: string | null;
  type: string | null;
  image: string | null;
  /** Calendar date, `YYYY-MM-DD`. */
  joined: string | null;
  isActive: boolean;
  isMember: boolean;
  isPublic: boolean;
  notes: string | null;
}

/**
 * Chat fields before a slug is assigned and a row id exists.
 */
export type ChatDraft = Omit<Chat, "id" | "slug">;

export interface ChatSummary extends Chat {
  messageCount: number;
  lastMessageAt: string | null;
}

/**
 * Loosely-typed chat fields from CLI options, archive documents or
 * MCP arguments. Normalized by `parseChatInput`.
 */
export interface ChatInput {
  name?: string | null | undefined;
  chatId?: string | number | null | undefined;
  link?: string | null | undefined;
  type?: string | null | undefined;
  image?: string | null | undefined;
  joined?: string | Date | null | undefined;
  isActive?: boolean | string | number | null | undefined;
  isMember?: boolean | string | number | null | undefined;
  isPublic?: boolean | string | number | null | undefined;
  notes?: string | null | undefined;
}
