// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import {
  databaseSchema,
  mcpCatchAll,
  mcpJson,
  openArchive,
  orderSchema,
} from "../helpers.js";

/** Register the list-chats MCP tool. */
export function registerListChats(server: McpServer): void {
  server.tool(
    "list-chats",
    "List archived chats with their message counts and the time of their latest message",
    {
      sortBy: z
        .enum(["name", "message_count", "last_message"])
        .optional()
        .describe("Sort field (default: last_message, newest first)"),
      order: orderSchema,
      ...databaseSchema,
    },
    async ({ sortBy, order, database }) => {
      try {
        const chats = await openArchive({ database }, (ctx) =>
          ctx.chats.list(sortBy, order),
        );
        return mcpJson({ chats, total: chats.length });
      } catch (error) {
        return mcpCatchAll(error, "Failed to list chats");
      }
    },
  );
}
