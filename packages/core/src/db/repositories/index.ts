// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

export { CHAT_SORT, ChatRepository } from "./chat.js";
export { FilterRepository } from "./filter.js";
export { guard, violates } from "./guard.js";
export { MESSAGE_SORT, MessageRepository } from "./message.js";
