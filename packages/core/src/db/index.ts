// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

export type {
  DatabaseAdapter,
  DialectName,
  QueryExecutor,
  SqlDialect,
  SqlFragment,
  SqlParam,
  SqlRow,
  UniqueViolation,
} from "./adapter.js";
export { createAdapter } from "./connect.js";
export {
  ChatNotFoundError,
  DatabaseError,
  DuplicateChatIdError,
  DuplicateMessageError,
  DuplicateSlugError,
  MessageNotFoundError,
  MissingPrimaryKeyError,
} from "./errors.js";
export { containsPattern, escapeLike, LIKE_ESCAPE } from "./escape-like.js";
export { buildMessageWhereClause } from "./filter-clause.js";
export { buildOrderClause, normalizeSortParams } from "./order-clause.js";
export {
  PostgresAdapter,
  postgresDialect,
  postgresUniqueViolation,
  toPositionalParams,
  type PostgresAdapterOptions,
} from "./postgres-adapter.js";
export {
  CHAT_SORT,
  ChatRepository,
  FilterRepository,
  MESSAGE_SORT,
  MessageRepository,
} from "./repositories/index.js";
export { initializeSchema, schemaFor } from "./schema.js";
export {
  SqliteAdapter,
  sqliteDialect,
  sqliteUniqueViolation,
  type SqliteAdapterOptions,
} from "./sqlite-adapter.js";
