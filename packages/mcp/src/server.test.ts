// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { createRequire } from "node:module";

import type { Client } from "@modelcontextprotocol/sdk/client/index.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { afterEach, describe, expect, it } from "vitest";

import { createServer } from "./server.js";

const require = createRequire(import.meta.url);
const { version } = require("../package.json") as { version: string };

let server: McpServer | undefined;
let client: Client | undefined;

afterEach(async () => {
  await client?.close();
  await server?.close();
  client = undefined;
  server = undefined;
});

async function connectPair() {
  const { Client: ClientCtor } = await import(
    "@modelcontextprotocol/sdk/client/index.js"
  );
  const { InMemoryTransport } = await import(
    "@modelcontextprotocol/sdk/inMemory.js"
  );

  server = createServer();
  const [clientTransport, serverTransport] =
    InMemoryTransport.createLinkedPair();
  client = new ClientCtor({ name: "test-client", version: "1.0.0" });

  await Promise.all([
    server.connect(serverTransport),
    client.connect(clientTransport),
  ]);

  return { server, client };
}

describe("createServer", () => {
  it("returns an McpServer instance", () => {
    server = createServer();

    expect(server).toHaveProperty("connect");
    expect(server).toHaveProperty("close");
    expect(server).toHaveProperty("tool");
  });

  it("reports its package name and version", async () => {
    const { client: c } = await connectPair();

    expect(c.getServerVersion()).toEqual(
      expect.objectContaining({ name: "@chatvault/mcp", version }),
    );
  });

  it("advertises tools capability", async () => {
    const { client: c } = await connectPair();

    expect(c.getServerCapabilities()?.tools).toBeDefined();
  });

  it("lists registered tools", async () => {
    const { client: c } = await connectPair();

    const { tools } = await c.listTools();

    expect(tools.map((t) => t.name)).toEqual([
      "list-chats",
      "get-chat",
      "search-messages",
      "archive-stats",
    ]);
  });

  it("publishes the input schema of each tool", async () => {
    const { client: c } = await connectPair();

    const { tools } = await c.listTools();
    const getChat = tools.find((t) => t.name === "get-chat");

    expect(getChat?.inputSchema.required).toEqual(["slug"]);
    expect(Object.keys(getChat?.inputSchema.properties ?? {})).toEqual([
      "slug",
      "includeMessages",
      "database",
    ]);
  });
});
