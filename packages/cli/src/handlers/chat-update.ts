// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { type ChatFieldOptions, chatInputFromOptions } from "./chat-fields.js";
import { type DatabaseOptions, openArchive } from "./database.js";
import { reportError, writeJson, writeLine } from "./output.js";

export async function handleChatUpdate(
  slug: string,
  options: DatabaseOptions & ChatFieldOptions & { json?: boolean },
): Promise<void> {
  try {
    const chat = await openArchive(options, (ctx) =>
      ctx.chats.update(slug, chatInputFromOptions(options)),
    );
    if (options.json) {
      writeJson(chat);
    } else if (chat.slug !== slug) {
      writeLine(`Chat updated: ${slug} is now ${chat.slug}`);
    } else {
      writeLine(`Chat updated: ${chat.slug}`);
    }
  } catch (error) {
    reportError(error);
  }
}
