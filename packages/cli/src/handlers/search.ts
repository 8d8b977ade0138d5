// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import {
  groupMessagesByChat,
  inferFilterAction,
  type MessageFilterInput,
  normalizeFilters,
} from "@chatvault/core";

import { type DatabaseOptions, openArchive } from "./database.js";
import { messageLine } from "./message-fields.js";
import { reportError, writeJson, writeLine } from "./output.js";

export interface SearchOptions extends DatabaseOptions {
  action?: string;
  query?: string;
  tag?: string;
  dateMode?: string;
  start?: string;
  end?: string;
  chat?: string;
  caseSensitive?: boolean;
  sort?: string;
  order?: string;
  json?: boolean;
}

export async function handleSearch(options: SearchOptions): Promise<void> {
  const input: MessageFilterInput = {
    action: options.action,
    query: options.query,
    tag: options.tag,
    dateMode: options.dateMode,
    startDate: options.start,
    endDate: options.end,
    caseSensitive: options.caseSensitive,
  };
  // Without --action the most specific filter given wins.
  const action = inferFilterAction(normalizeFilters(input)).action;

  try {
    const { outcome, timeZone } = await openArchive(options, async (ctx) => ({
      outcome: await ctx.filters.resolve(
        { ...input, ...(action !== null && { action }) },
        options.sort,
        options.order,
        options.chat,
      ),
      timeZone: ctx.config.timeZone,
    }));

    if (outcome.status === "invalid" || outcome.status === "error") {
      process.stderr.write(`${outcome.message}\n`);
      process.exitCode = 1;
      return;
    }
    if (options.json) {
      writeJson({
        status: outcome.status,
        message: outcome.message,
        messages: outcome.rows,
        total: outcome.rows.length,
      });
      return;
    }
    if (outcome.status === "empty") {
      writeLine(outcome.message);
      return;
    }
    if (outcome.rows.length === 0) {
      writeLine("No messages found.");
      return;
    }

    writeLine(`Found ${String(outcome.rows.length)} messages:`);
    for (const group of groupMessagesByChat(outcome.rows)) {
      writeLine();
      writeLine(`${group.chatName} (${group.chatSlug})`);
      for (const message of group.messages) {
        writeLine(`  ${messageLine(message, timeZone)}`);
      }
    }
  } catch (error) {
    reportError(error);
  }
}
