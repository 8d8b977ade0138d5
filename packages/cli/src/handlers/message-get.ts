// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { type DatabaseOptions, openArchive } from "./database.js";
import { writeMessage } from "./message-fields.js";
import { reportError, writeJson, writeLine } from "./output.js";

export async function handleMessageGet(
  id: number,
  options: DatabaseOptions & { json?: boolean },
): Promise<void> {
  try {
    const { detail, timeZone } = await openArchive(options, async (ctx) => ({
      detail: await ctx.messages.get(id),
      timeZone: ctx.config.timeZone,
    }));

    if (options.json) {
      writeJson({
        ...detail.message,
        previousId: detail.previousId,
        nextId: detail.nextId,
      });
      return;
    }
    writeMessage(detail.message, timeZone);
    const neighbours: string[] = [];
    if (detail.previousId !== null) {
      neighbours.push(`previous #${String(detail.previousId)}`);
    }
    if (detail.nextId !== null) {
      neighbours.push(`next #${String(detail.nextId)}`);
    }
    if (neighbours.length > 0) {
      writeLine();
      writeLine(`See also: ${neighbours.join(", ")}`);
    }
  } catch (error) {
    reportError(error);
  }
}
