// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import {
  ChatNotFoundError,
  ConfigError,
  type DatabaseContext,
  errorMessage,
  loadConfig,
  MessageNotFoundError,
  setLogLevel,
  withDatabase,
} from "@chatvault/core";
import { z } from "zod";

type TextContent = { type: "text"; text: string };
type McpResult = { isError?: boolean; content: TextContent[] };

/**
 * Shared Zod schema field for selecting the archive.
 *
 * Spread into every tool that opens the database:
 * ```ts
 * { slug: z.string(), ...databaseSchema }
 * ```
 */
export const databaseSchema = {
  database: z
    .string()
    .min(1)
    .optional()
    .describe("Database URL or SQLite path (default: DATABASE_URL)"),
};

export const orderSchema = z
  .enum(["asc", "desc"])
  .optional()
  .describe("Sort direction");

/**
 * Load configuration from the environment and run `work` against the
 * selected archive. The database is closed afterwards.
 */
export async function openArchive<T>(
  args: { database?: string | undefined },
  work: (ctx: DatabaseContext) => Promise<T>,
): Promise<T> {
  const config = loadConfig(process.env, { databaseUrl: args.database });
  setLogLevel(config.logLevel);
  return withDatabase(config, work);
}

/**
 * Build an MCP error response from a plain message string.
 */
export function mcpError(text: string): McpResult {
  return {
    isError: true,
    content: [{ type: "text" as const, text }],
  };
}

/**
 * Build an MCP success response from a plain text or JSON payload.
 */
export function mcpSuccess(text: string): McpResult {
  return {
    content: [{ type: "text" as const, text }],
  };
}

export function mcpJson(payload: unknown): McpResult {
  return mcpSuccess(JSON.stringify(payload, null, 2));
}

/**
 * Map lookup and configuration errors to an MCP error response.
 *
 * Returns `undefined` if the error is not a recognised error so the
 * caller can fall through to its own handling.
 */
export function mapErrorToMcpResponse(error: unknown): McpResult | undefined {
  if (
    error instanceof ChatNotFoundError ||
    error instanceof MessageNotFoundError
  ) {
    return mcpError(`${error.message}.`);
  }
  if (error instanceof ConfigError) {
    return mcpError(error.message);
  }
  return undefined;
}

/**
 * Map an arbitrary caught error to an MCP error response with a
 * contextual prefix (e.g. "Failed to list chats").
 */
export function mcpCatchAll(error: unknown, prefix: string): McpResult {
  const mapped = mapErrorToMcpResponse(error);
  if (mapped) return mapped;

  const message = errorMessage(error);
  return mcpError(`${prefix}: ${message}`);
}
