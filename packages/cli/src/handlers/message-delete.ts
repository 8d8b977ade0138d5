// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { type DatabaseOptions, openArchive } from "./database.js";
import { reportError, writeJson, writeLine } from "./output.js";

export async function handleMessageDelete(
  id: number,
  options: DatabaseOptions & { json?: boolean },
): Promise<void> {
  try {
    const message = await openArchive(options, (ctx) =>
      ctx.messages.delete(id),
    );
    if (options.json) {
      writeJson({ success: true, deleted: message });
    } else {
      writeLine(`Message #${String(message.id)} deleted`);
    }
  } catch (error) {
    reportError(error);
  }
}
