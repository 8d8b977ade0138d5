// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { type DatabaseOptions, openArchive } from "./database.js";
import { reportError, writeJson, writeLine } from "./output.js";

export async function handleChatDelete(
  slug: string,
  options: DatabaseOptions & { json?: boolean },
): Promise<void> {
  try {
    const chat = await openArchive(options, (ctx) => ctx.chats.delete(slug));
    if (options.json) {
      writeJson({ success: true, deleted: chat });
    } else {
      writeLine(`Chat deleted: ${chat.slug}`);
    }
  } catch (error) {
    reportError(error);
  }
}
