// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { errorMessage, getLogger } from "@chatvault/core";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { createServer } from "./server.js";

const log = getLogger("mcp");

/**
 * Start the MCP server on stdio and register signal handlers for
 * graceful shutdown. The process stays alive until SIGINT/SIGTERM.
 */
export async function runStdioServer(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();

  try {
    await server.connect(transport);
  } catch (error: unknown) {
    const message = errorMessage(error);
    process.stderr.write(`Failed to start MCP server: ${message}\n`);
    process.exit(1);
  }

  log.info("MCP server running on stdio");

  function shutdown() {
    server
      .close()
      .catch((error: unknown) => {
        log.error({ err: error }, "Error during shutdown");
      })
      .finally(() => {
        process.exit(0);
      });
  }

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}
