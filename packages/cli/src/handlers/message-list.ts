// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { type DatabaseOptions, openArchive } from "./database.js";
import { messageLine } from "./message-fields.js";
import { reportError, writeJson, writeLine } from "./output.js";

export async function handleMessageList(
  slug: string,
  options: DatabaseOptions & {
    sort?: string;
    order?: string;
    json?: boolean;
  },
): Promise<void> {
  try {
    const { messages, timeZone } = await openArchive(options, async (ctx) => ({
      messages: await ctx.messages.listByChat(slug, options.sort, options.order),
      timeZone: ctx.config.timeZone,
    }));

    if (options.json) {
      writeJson({ messages, total: messages.length });
      return;
    }
    if (messages.length === 0) {
      writeLine(`No messages in ${slug}.`);
      return;
    }
    writeLine(
      `Messages in ${messages[0]?.chatName ?? slug} (${String(messages.length)} total):`,
    );
    writeLine();
    for (const message of messages) {
      writeLine(messageLine(message, timeZone));
    }
  } catch (error) {
    reportError(error);
  }
}
