// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import {
  databaseSchema,
  mcpCatchAll,
  mcpJson,
  openArchive,
} from "../helpers.js";

/** Register the archive-stats MCP tool. */
export function registerArchiveStats(server: McpServer): void {
  server.tool(
    "archive-stats",
    "Totals for the archive: chats, messages, messages with media, the most active chat and the latest message",
    { ...databaseSchema },
    async ({ database }) => {
      try {
        const stats = await openArchive({ database }, (ctx) =>
          ctx.chats.stats(),
        );
        return mcpJson(stats);
      } catch (error) {
        return mcpCatchAll(error, "Failed to compute archive stats");
      }
    },
  );
}
