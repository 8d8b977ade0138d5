// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import {
  DATE_MODES,
  FILTER_ACTIONS,
  inferFilterAction,
  type MessageFilterInput,
  normalizeFilters,
} from "@chatvault/core";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import {
  databaseSchema,
  mcpCatchAll,
  mcpError,
  mcpJson,
  openArchive,
  orderSchema,
} from "../helpers.js";

/** Register the search-messages MCP tool. */
export function registerSearchMessages(server: McpServer): void {
  server.tool(
    "search-messages",
    "Search archived messages by text, exact tag or date. Without an action the most specific filter given is used.",
    {
      action: z
        .enum(FILTER_ACTIONS)
        .optional()
        .describe("Filter kind: search (text), tag or filter (date)"),
      query: z.string().optional().describe("Text to search for"),
      caseSensitive: z
        .boolean()
        .optional()
        .describe("Match letter case exactly (default: false)"),
      tag: z.string().optional().describe("Exact tag"),
      dateMode: z
        .enum(DATE_MODES)
        .optional()
        .describe("Date comparison for the filter action"),
      startDate: z
        .string()
        .optional()
        .describe("Date, or start of the range (YYYY-MM-DD)"),
      endDate: z
        .string()
        .optional()
        .describe("End of the range for the between mode (YYYY-MM-DD)"),
      chatSlug: z.string().optional().describe("Limit to one chat"),
      sortBy: z
        .enum(["timestamp", "msg_id"])
        .optional()
        .describe("Sort field (default: timestamp)"),
      order: orderSchema,
      ...databaseSchema,
    },
    async ({ chatSlug, sortBy, order, database, ...filters }) => {
      const input: MessageFilterInput = { ...filters };
      const { action } = inferFilterAction(normalizeFilters(input));

      try {
        const outcome = await openArchive({ database }, (ctx) =>
          ctx.filters.resolve(
            { ...input, ...(action !== null && { action }) },
            sortBy,
            order,
            chatSlug,
          ),
        );

        if (outcome.status === "invalid" || outcome.status === "error") {
          return mcpError(outcome.message);
        }
        return mcpJson({
          status: outcome.status,
          message: outcome.message,
          messages: outcome.rows,
          total: outcome.rows.length,
        });
      } catch (error) {
        return mcpCatchAll(error, "Failed to search messages");
      }
    },
  );
}
