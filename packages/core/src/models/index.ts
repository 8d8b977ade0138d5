// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

export {
  chatDisplayName,
  chatToRecord,
  type ChatRecord,
  parseChatInput,
  parseChatRow,
  parseChatSummaryRow,
} from "./chat.js";
export {
  messageShortText,
  messageToRecord,
  type MessageRecord,
  parseMessageInput,
  parseMessageRow,
  parseMessageWithChatRow,
} from "./message.js";
export {
  emptyToNull,
  normalizeText,
  parseJoined,
  parseMedia,
  parseTags,
  parseTagsDetailed,
  type ParsedTags,
  type TagSource,
  toBool,
  toIntOrNull,
} from "./normalize.js";
