// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { createProgram as createBaseProgram } from "@chatvault/cli";
import { runStdioServer } from "@chatvault/mcp/stdio";
import type { Command } from "commander";

/**
 * The archive CLI plus the `mcp` subcommand that serves the archive
 * tools over stdio.
 */
export function createProgram(): Command {
  const program = createBaseProgram();

  program
    .command("mcp")
    .description("Start MCP server on stdio (for MCP-capable assistants)")
    .action(async () => {
      await runStdioServer();
    });

  return program;
}
