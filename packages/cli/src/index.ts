// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

export { createProgram } from "./program.js";
export * from "./handlers/index.js";
