// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { registerArchiveStats } from "./archive-stats.js";
import { registerGetChat } from "./get-chat.js";
import { registerListChats } from "./list-chats.js";
import { registerSearchMessages } from "./search-messages.js";

export function registerAllTools(server: McpServer): void {
  registerListChats(server);
  registerGetChat(server);
  registerSearchMessages(server);
  registerArchiveStats(server);
}
