// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { writeChat } from "./chat-fields.js";
import { type DatabaseOptions, openArchive } from "./database.js";
import { reportError, writeJson } from "./output.js";

export async function handleChatGet(
  slug: string,
  options: DatabaseOptions & { json?: boolean },
): Promise<void> {
  try {
    const chat = await openArchive(options, (ctx) => ctx.chats.getBySlug(slug));
    if (options.json) {
      writeJson(chat);
    } else {
      writeChat(chat);
    }
  } catch (error) {
    reportError(error);
  }
}
