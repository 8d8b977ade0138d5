// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

export { openTestDatabase, seedChat, seedMessage } from "./open-test-database.js";
