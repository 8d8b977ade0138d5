// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

export { ArchiveService } from "./archive.js";
export { ChatService, validateChatInput, type ClockOptions } from "./chat.js";
export {
  withDatabase,
  type DatabaseContext,
  type WithDatabaseOptions,
} from "./database-context.js";
export { ServiceError, ValidationError } from "./errors.js";
export {
  EMPTY_FILTERS_MESSAGE,
  FilterService,
  groupMessagesByChat,
  inferFilterAction,
  isEmptyFilters,
  normalizeFilters,
  validateFilters,
} from "./filter.js";
export { MessageService, validateMessageInput } from "./message.js";
