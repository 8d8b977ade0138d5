// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { afterEach, describe, expect, it, vi } from "vitest";

vi.mock("@chatvault/mcp/stdio", () => ({
  runStdioServer: vi.fn().mockResolvedValue(undefined),
}));

import { createProgram as createBaseProgram } from "@chatvault/cli";
import { runStdioServer } from "@chatvault/mcp/stdio";

import { createProgram } from "./program.js";

describe("chatvault program", () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it("composes the archive CLI with an mcp subcommand", () => {
    const names = createProgram().commands.map((c) => c.name());
    const baseNames = createBaseProgram().commands.map((c) => c.name());

    expect(names).toEqual([...baseNames, "mcp"]);
  });

  it("mcp command does not conflict with existing archive commands", () => {
    const baseNames = createBaseProgram().commands.map((c) => c.name());

    expect(baseNames).not.toContain("mcp");
  });

  it("starts the stdio server for mcp", async () => {
    await createProgram().parseAsync(["node", "chatvault", "mcp"]);

    expect(runStdioServer).toHaveBeenCalledOnce();
  });
});
