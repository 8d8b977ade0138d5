// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { type DatabaseOptions, openArchive } from "./database.js";
import {
  type MessageFieldOptions,
  messageInputFromOptions,
} from "./message-fields.js";
import { reportError, writeJson, writeLine } from "./output.js";

export async function handleMessageUpdate(
  id: number,
  options: DatabaseOptions & MessageFieldOptions & { json?: boolean },
): Promise<void> {
  try {
    const message = await openArchive(options, (ctx) =>
      ctx.messages.update(id, messageInputFromOptions(options)),
    );
    if (options.json) {
      writeJson(message);
    } else {
      writeLine(`Message #${String(message.id)} updated`);
    }
  } catch (error) {
    reportError(error);
  }
}
