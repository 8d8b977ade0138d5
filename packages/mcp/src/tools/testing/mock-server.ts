// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { vi } from "vitest";
import type { ZodRawShape } from "zod";
import { z } from "zod";

type ToolHandler = (args: Record<string, unknown>) => Promise<unknown>;

interface ToolEntry {
  handler: ToolHandler;
  schema: z.ZodObject<ZodRawShape>;
}

/**
 * Stand-in for {@link McpServer} that records `server.tool(name,
 * description, schema, handler)` registrations.
 *
 * `getHandler` parses arguments through the registered schema first,
 * so defaults apply the way the SDK applies them.
 */
export function createMockServer() {
  const tools = new Map<string, ToolEntry>();

  const server = {
    tool: vi.fn(
      (
        name: string,
        _description: string,
        shape: ZodRawShape,
        handler: ToolHandler,
      ) => {
        tools.set(name, { handler, schema: z.object(shape) });
      },
    ),
  } as unknown as McpServer;

  function entry(name: string): ToolEntry {
    const found = tools.get(name);
    if (!found) throw new Error(`Tool "${name}" not registered`);
    return found;
  }

  function getHandler(name: string): ToolHandler {
    const { handler, schema } = entry(name);
    return (args) => handler(schema.parse(args));
  }

  function getSchema(name: string): z.ZodObject<ZodRawShape> {
    return entry(name).schema;
  }

  return { server, getHandler, getSchema };
}
