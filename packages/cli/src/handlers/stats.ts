// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { formatTimestamp } from "@chatvault/core";

import { type DatabaseOptions, openArchive } from "./database.js";
import { reportError, writeJson, writeLine } from "./output.js";

export async function handleStats(
  options: DatabaseOptions & { json?: boolean },
): Promise<void> {
  try {
    const { stats, timeZone } = await openArchive(options, async (ctx) => ({
      stats: await ctx.chats.stats(),
      timeZone: ctx.config.timeZone,
    }));

    if (options.json) {
      writeJson(stats);
      return;
    }
    writeLine(`Chats: ${String(stats.totalChats)}`);
    writeLine(`Messages: ${String(stats.totalMessages)}`);
    writeLine(`Messages with media: ${String(stats.mediaMessages)}`);
    if (stats.mostActiveChat !== null) {
      const { name, slug, messageCount } = stats.mostActiveChat;
      writeLine(
        `Most active chat: ${name} (${slug}, ${String(messageCount)} messages)`,
      );
    }
    if (stats.lastMessage !== null) {
      const { id, timestamp, chatName } = stats.lastMessage;
      writeLine(
        `Last message: #${String(id)} in ${chatName} at ${formatTimestamp(timestamp, "datetime", timeZone)}`,
      );
    }
  } catch (error) {
    reportError(error);
  }
}
