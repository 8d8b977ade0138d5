// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { type DatabaseOptions, openArchive } from "./database.js";
import {
  type MessageFieldOptions,
  messageInputFromOptions,
} from "./message-fields.js";
import { reportError, writeJson, writeLine } from "./output.js";

export async function handleMessageAdd(
  slug: string,
  options: DatabaseOptions & MessageFieldOptions & { json?: boolean },
): Promise<void> {
  try {
    const message = await openArchive(options, (ctx) =>
      ctx.messages.create(slug, messageInputFromOptions(options)),
    );
    if (options.json) {
      writeJson(message);
    } else {
      writeLine(`Message #${String(message.id)} added to ${slug}`);
    }
  } catch (error) {
    reportError(error);
  }
}
