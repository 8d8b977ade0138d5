// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

export { handleArchiveExport } from "./archive-export.js";
export { archiveFormatFor, handleArchiveImport } from "./archive-import.js";
export { handleChatCreate } from "./chat-create.js";
export { handleChatDelete } from "./chat-delete.js";
export { handleChatGet } from "./chat-get.js";
export { handleChatList } from "./chat-list.js";
export { handleChatUpdate } from "./chat-update.js";
export { handleInitDb } from "./init-db.js";
export { handleMessageAdd } from "./message-add.js";
export { handleMessageDelete } from "./message-delete.js";
export { handleMessageGet } from "./message-get.js";
export { handleMessageList } from "./message-list.js";
export { handleMessageUpdate } from "./message-update.js";
export { handleSearch } from "./search.js";
export { handleStats } from "./stats.js";
