// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import {
  type Chat,
  type ChatInput,
  formatDate,
} from "@chatvault/core";

import { writeLine, yesNo } from "./output.js";

/** Chat fields as commander parses them. */
export interface ChatFieldOptions {
  name?: string;
  chatId?: string;
  link?: string;
  type?: string;
  image?: string;
  joined?: string;
  active?: boolean;
  member?: boolean;
  public?: boolean;
  notes?: string;
}

export function chatInputFromOptions(options: ChatFieldOptions): ChatInput {
  return {
    name: options.name,
    chatId: options.chatId,
    link: options.link,
    type: options.type,
    image: options.image,
    joined: options.joined,
    isActive: options.active,
    isMember: options.member,
    isPublic: options.public,
    notes: options.notes,
  };
}

export function writeChat(chat: Chat): void {
  writeLine(`Chat: ${chat.name} (${chat.slug})`);
  if (chat.chatId !== null) {
    writeLine(`Chat ID: ${String(chat.chatId)}`);
  }
  if (chat.type !== null) {
    writeLine(`Type: ${chat.type}`);
  }
  if (chat.link !== null) {
    writeLine(`Link: ${chat.link}`);
  }
  if (chat.joined !== null) {
    writeLine(`Joined: ${formatDate(chat.joined, "long_date")}`);
  }
  writeLine(`Active: ${yesNo(chat.isActive)}`);
  writeLine(`Member: ${yesNo(chat.isMember)}`);
  writeLine(`Public: ${yesNo(chat.isPublic)}`);
  if (chat.notes !== null) {
    writeLine(`Notes: ${chat.notes}`);
  }
}
