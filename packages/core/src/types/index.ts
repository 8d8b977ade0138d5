// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

export type { Chat, ChatDraft, ChatInput, ChatSummary } from "./chat.js";
export {
  DATE_MODES,
  FILTER_ACTIONS,
  type ChatMessageGroup,
  type DateMode,
  type DateRange,
  type FilterAction,
  type FilterCriteria,
  type FilterOutcome,
  type FilterStatus,
  type FilterValidation,
  type MessageFilterInput,
  type MessageFilters,
} from "./filters.js";
export type {
  AdjacentDirection,
  Message,
  MessageDetail,
  MessageDraft,
  MessageInput,
  MessageWithChat,
} from "./message.js";
export type { SortConfig, SortOrder, SortParams } from "./sort.js";
export type { ArchiveStats, LatestMessage, MostActiveChat } from "./stats.js";
export type {
  ArchiveChat,
  ArchiveDocument,
  ArchiveFormat,
  ImportOptions,
  ImportResult,
} from "./archive.js";
