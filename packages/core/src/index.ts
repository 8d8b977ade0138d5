// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

// Types
export type {
  AdjacentDirection,
  ArchiveChat,
  ArchiveDocument,
  ArchiveFormat,
  ArchiveStats,
  Chat,
  ChatDraft,
  ChatInput,
  ChatMessageGroup,
  ChatSummary,
  DateMode,
  DateRange,
  FilterAction,
  FilterCriteria,
  FilterOutcome,
  FilterStatus,
  FilterValidation,
  ImportOptions,
  ImportResult,
  LatestMessage,
  Message,
  MessageDetail,
  MessageDraft,
  MessageFilterInput,
  MessageFilters,
  MessageInput,
  MessageWithChat,
  MostActiveChat,
  SortConfig,
  SortOrder,
  SortParams,
} from "./types/index.js";
export { DATE_MODES, FILTER_ACTIONS } from "./types/index.js";

// Configuration and logging
export {
  ConfigError,
  DEFAULT_DATABASE_URL,
  DEFAULT_TIME_ZONE,
  loadConfig,
  loadEnvironmentFile,
  parseDatabaseUrl,
  type AppConfig,
  type DatabaseTarget,
  type Environment,
} from "./config.js";
export { getLogger, setLogLevel, type LogLevel } from "./logging.js";

// Models
export {
  chatDisplayName,
  emptyToNull,
  messageShortText,
  parseChatInput,
  parseMessageInput,
  parseTags,
  toBool,
  toIntOrNull,
} from "./models/index.js";

// Services
export {
  ArchiveService,
  ChatService,
  EMPTY_FILTERS_MESSAGE,
  FilterService,
  groupMessagesByChat,
  inferFilterAction,
  isEmptyFilters,
  MessageService,
  normalizeFilters,
  ServiceError,
  validateChatInput,
  validateFilters,
  validateMessageInput,
  ValidationError,
  withDatabase,
  type ClockOptions,
  type DatabaseContext,
  type WithDatabaseOptions,
} from "./services/index.js";

// Data access
export {
  buildMessageWhereClause,
  buildOrderClause,
  CHAT_SORT,
  ChatRepository,
  createAdapter,
  FilterRepository,
  initializeSchema,
  MESSAGE_SORT,
  MessageRepository,
  normalizeSortParams,
  PostgresAdapter,
  SqliteAdapter,
  type DatabaseAdapter,
  type QueryExecutor,
} from "./db/index.js";

// Errors (data-layer errors propagate through the service layer)
export {
  ChatNotFoundError,
  DatabaseError,
  DuplicateChatIdError,
  DuplicateMessageError,
  DuplicateSlugError,
  MessageNotFoundError,
  MissingPrimaryKeyError,
} from "./db/index.js";

// Formats
export {
  ArchiveFormatError,
  formatArchiveDocument,
  FormatError,
  parseArchive,
  parseArchiveJson,
  parseArchiveYaml,
  serializeArchiveJson,
  serializeArchiveYaml,
  toArchiveDocument,
} from "./formats/index.js";

// Utilities
export {
  errorMessage,
  formatDate,
  formatTimestamp,
  parseDate,
  parseDateTime,
  SlugGenerationError,
  slugify,
  TimeParseError,
  todayIso,
  toUtcIso,
} from "./utils/index.js";
