// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import {
  databaseSchema,
  mcpCatchAll,
  mcpJson,
  openArchive,
} from "../helpers.js";

/** Register the get-chat MCP tool. */
export function registerGetChat(server: McpServer): void {
  server.tool(
    "get-chat",
    "Show one archived chat by slug, optionally with its messages oldest first",
    {
      slug: z.string().min(1).describe("Chat slug"),
      includeMessages: z
        .boolean()
        .optional()
        .default(false)
        .describe("Include the chat's messages"),
      ...databaseSchema,
    },
    async ({ slug, includeMessages, database }) => {
      try {
        const payload = await openArchive({ database }, async (ctx) => {
          const chat = await ctx.chats.getBySlug(slug);
          if (!includeMessages) {
            return { chat };
          }
          const messages = await ctx.messages.listByChat(
            slug,
            "timestamp",
            "asc",
          );
          return { chat, messages };
        });
        return mcpJson(payload);
      } catch (error) {
        return mcpCatchAll(error, "Failed to get chat");
      }
    },
  );
}
