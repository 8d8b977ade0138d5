// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import type { ChatInput } from "./chat.js";
import type { MessageInput } from "./message.js";

export type ArchiveFormat = "yaml" | "json";

/**
 * Chat fields of an archive document. `slug` is informational on
 * import: a new slug is derived from the name unless merging.
 */
export interface ArchiveChat extends ChatInput {
  name: string;
  slug?: string | null | undefined;
}

/**
 * Portable form of one chat with its messages, as read from or written
 * to YAML/JSON. Field values are loose and go through the usual input
 * normalization on import.
 */
export interface ArchiveDocument {
  version: "1";
  chat: ArchiveChat;
  messages: MessageInput[];
}

export interface ImportOptions {
  /** Add to an existing chat with the same slug instead of creating one. */
  merge?: boolean;
}

export interface ImportResult {
  chatSlug: string;
  /** Whether the chat was created by this import. */
  created: boolean;
  imported: number;
  /** Messages skipped because their `msgId` already exists in the chat. */
  skipped: number;
}
