// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { type ChatFieldOptions, chatInputFromOptions } from "./chat-fields.js";
import { type DatabaseOptions, openArchive } from "./database.js";
import { reportError, writeJson, writeLine } from "./output.js";

export async function handleChatCreate(
  options: DatabaseOptions & ChatFieldOptions & { json?: boolean },
): Promise<void> {
  try {
    const chat = await openArchive(options, (ctx) =>
      ctx.chats.create(chatInputFromOptions(options)),
    );
    if (options.json) {
      writeJson(chat);
    } else {
      writeLine(`Chat created: ${chat.slug}`);
    }
  } catch (error) {
    reportError(error);
  }
}
