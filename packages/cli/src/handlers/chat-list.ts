// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { formatTimestamp } from "@chatvault/core";

import { type DatabaseOptions, openArchive } from "./database.js";
import { reportError, writeJson, writeLine } from "./output.js";

export async function handleChatList(
  options: DatabaseOptions & {
    sort?: string;
    order?: string;
    json?: boolean;
  },
): Promise<void> {
  try {
    const { chats, timeZone } = await openArchive(options, async (ctx) => ({
      chats: await ctx.chats.list(options.sort, options.order),
      timeZone: ctx.config.timeZone,
    }));

    if (options.json) {
      writeJson({ chats, total: chats.length });
      return;
    }
    if (chats.length === 0) {
      writeLine("No chats found.");
      return;
    }

    writeLine(`Chats (${String(chats.length)} total):`);
    writeLine();
    for (const chat of chats) {
      const last =
        chat.lastMessageAt === null
          ? "no dated messages"
          : `last ${formatTimestamp(chat.lastMessageAt, "datetime", timeZone)}`;
      writeLine(
        `${chat.slug}  ${chat.name} (${String(chat.messageCount)} messages, ${last})`,
      );
    }
  } catch (error) {
    reportError(error);
  }
}
