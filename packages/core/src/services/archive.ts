// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import type { QueryExecutor } from "../db/adapter.js";
import { ChatNotFoundError } from "../db/errors.js";
import { ChatRepository } from "../db/repositories/chat.js";
import { MessageRepository } from "../db/repositories/message.js";
import { ArchiveFormatError, toArchiveDocument } from "../formats/archive-format.js";
import { getLogger } from "../logging.js";
import { parseMessageInput } from "../models/message.js";
import { emptyToNull, toIntOrNull } from "../models/normalize.js";
import type {
  ArchiveDocument,
  Chat,
  ImportOptions,
  ImportResult,
  MessageDraft,
  MessageInput,
} from "../types/index.js";
import { resolveUniqueSlug, slugify } from "../utils/slug.js";
import { parseDateTime, toUtcIso } from "../utils/time.js";
import type { ClockOptions } from "./chat.js";
import { validateChatInput } from "./chat.js";

const log = getLogger("archive-service");

/**
 * Archived messages are taken as they are: text may be missing and
 * timestamps may lie in the future. Only values that cannot be read
 * at all are rejected.
 */
function toImportedMessage(
  chatRefId: number,
  input: MessageInput,
  index: number,
  timeZone: string,
): MessageDraft {
  const where = `Message at index ${String(index)}`;

  const rawMsgId = emptyToNull(input.msgId);
  if (rawMsgId !== null && toIntOrNull(rawMsgId) === null) {
    throw new ArchiveFormatError(`${where} has an invalid msgId: ${rawMsgId}`);
  }

  let timestamp: string | null = null;
  if (input.timestamp instanceof Date) {
    if (Number.isNaN(input.timestamp.getTime())) {
      throw new ArchiveFormatError(`${where} has an invalid timestamp`);
    }
    timestamp = toUtcIso(input.timestamp);
  } else {
    const raw = emptyToNull(input.timestamp);
    if (raw !== null) {
      timestamp = parseDateTime(raw, timeZone);
      if (timestamp === null) {
        throw new ArchiveFormatError(
          `${where} has an invalid timestamp: ${raw}`,
        );
      }
    }
  }

  return parseMessageInput(chatRefId, { ...input, timestamp });
}

/**
 * Moves whole chats in and out of the portable archive document.
 */
export class ArchiveService {
  constructor(
    private readonly db: QueryExecutor,
    private readonly clock: ClockOptions,
  ) {}

  /**
   * Store a chat and its messages in one transaction. Messages whose
   * `msgId` already exists in the chat are skipped and counted; any
   * other failure rolls the whole import back.
   *
   * @throws ValidationError when the chat fields are invalid
   * @throws ArchiveFormatError when a message value cannot be read
   */
  async import(
    document: ArchiveDocument,
    options: ImportOptions = {},
  ): Promise<ImportResult> {
    const result = await this.db.transaction(async (tx) => {
      const chats = new ChatRepository(tx);
      const messages = new MessageRepository(tx);

      const { chat, created } = await this.resolveChat(
        chats,
        document,
        options.merge ?? false,
      );

      let imported = 0;
      let skipped = 0;
      for (const [index, input] of document.messages.entries()) {
        const draft = toImportedMessage(
          chat.id,
          input,
          index,
          this.clock.timeZone,
        );
        if (
          draft.msgId !== null &&
          (await messages.existsByExternalId(chat.id, draft.msgId))
        ) {
          skipped += 1;
          continue;
        }
        await messages.insert(draft);
        imported += 1;
      }

      return { chatSlug: chat.slug, created, imported, skipped };
    });

    log.info(result, "Archive imported");
    return result;
  }

  /**
   * The chat with its messages in chronological order.
   *
   * @throws ChatNotFoundError
   */
  async export(slug: string): Promise<ArchiveDocument> {
    const chat = await new ChatRepository(this.db).getBySlug(slug);
    if (chat === null) {
      throw new ChatNotFoundError(slug);
    }
    const messages = await new MessageRepository(this.db).listByChat(
      slug,
      "timestamp",
      "asc",
    );
    log.debug({ slug, count: messages.length }, "Archive exported");
    return toArchiveDocument(chat, messages);
  }

  private async resolveChat(
    chats: ChatRepository,
    document: ArchiveDocument,
    merge: boolean,
  ): Promise<{ chat: Chat; created: boolean }> {
    const draft = validateChatInput(document.chat, this.clock);

    if (merge) {
      const slug = emptyToNull(document.chat.slug) ?? slugify(draft.name);
      const existing = await chats.getBySlug(slug);
      if (existing !== null) {
        return { chat: existing, created: false };
      }
    }

    const slug = await resolveUniqueSlug(slugify(draft.name), draft.name, (s) =>
      chats.existsBySlug(s),
    );
    const id = await chats.insert({ slug, ...draft });
    return { chat: { id, slug, ...draft }, created: true };
  }
}
