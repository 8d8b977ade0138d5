// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

export { createServer } from "./server.js";
export { runStdioServer } from "./stdio.js";
export { registerAllTools } from "./tools/index.js";
