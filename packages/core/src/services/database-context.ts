// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import type { AppConfig } from "../config.js";
import type { DatabaseAdapter } from "../db/adapter.js";
import { createAdapter } from "../db/connect.js";
import { initializeSchema } from "../db/schema.js";
import { ArchiveService } from "./archive.js";
import { ChatService, type ClockOptions } from "./chat.js";
import { FilterService } from "./filter.js";
import { MessageService } from "./message.js";

/**
 * Resources available for one logical operation against the archive.
 */
export interface DatabaseContext {
  readonly config: AppConfig;
  readonly db: DatabaseAdapter;
  readonly chats: ChatService;
  readonly messages: MessageService;
  readonly filters: FilterService;
  readonly archive: ArchiveService;
}

export interface WithDatabaseOptions {
  /** Create missing tables and indexes before running the callback. */
  initialize?: boolean;
  /** Overrides the system clock; the zone always comes from the config. */
  now?: () => Date;
  /** Opens the backend; defaults to {@link createAdapter}. */
  open?: (config: AppConfig) => DatabaseAdapter;
}

/**
 * Open the configured database inside a managed scope.
 *
 * The database is closed when the callback finishes, whether it
 * resolves or rejects.
 */
export async function withDatabase<T>(
  config: AppConfig,
  callback: (ctx: DatabaseContext) => T | Promise<T>,
  options: WithDatabaseOptions = {},
): Promise<T> {
  const db = (options.open ?? createAdapter)(config);
  const clock: ClockOptions = {
    timeZone: config.timeZone,
    ...(options.now !== undefined && { now: options.now }),
  };
  try {
    if (options.initialize === true) {
      await initializeSchema(db);
    }
    return await callback({
      config,
      db,
      chats: new ChatService(db, clock),
      messages: new MessageService(db, clock),
      filters: new FilterService(db),
      archive: new ArchiveService(db, clock),
    });
  } finally {
    await db.close();
  }
}
