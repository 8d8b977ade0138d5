// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { type DatabaseOptions, openArchive } from "./database.js";
import { reportError, writeLine } from "./output.js";

export async function handleInitDb(options: DatabaseOptions): Promise<void> {
  try {
    const target = await openArchive(
      options,
      async (ctx) => ctx.config.database,
      true,
    );
    writeLine(
      target.kind === "sqlite"
        ? `Database initialized at ${target.filename}`
        : "Database initialized on PostgreSQL",
    );
  } catch (error) {
    reportError(error);
  }
}
