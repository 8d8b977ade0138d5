// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import type { QueryExecutor } from "../db/adapter.js";
import { ChatNotFoundError, MessageNotFoundError } from "../db/errors.js";
import { ChatRepository } from "../db/repositories/chat.js";
import { MessageRepository } from "../db/repositories/message.js";
import { getLogger } from "../logging.js";
import { parseMessageInput } from "../models/message.js";
import { emptyToNull, normalizeText } from "../models/normalize.js";
import type {
  Chat,
  Message,
  MessageDetail,
  MessageDraft,
  MessageInput,
  MessageWithChat,
} from "../types/index.js";
import { parseDateTime, toUtcIso } from "../utils/time.js";
import type { ClockOptions } from "./chat.js";
import { ValidationError } from "./errors.js";

const log = getLogger("message-service");

const URL_PATTERN = /^https?:\/\/\S+$/i;
const DIGITS = /^\d+$/;

/**
 * Resolve the timestamp of user input to UTC, or the message
 * explaining why it cannot be used.
 */
function resolveTimestamp(
  value: MessageInput["timestamp"],
  clock: ClockOptions,
): { timestamp: string } | { error: string } {
  let timestamp: string | null = null;
  if (value instanceof Date) {
    timestamp = Number.isNaN(value.getTime()) ? null : toUtcIso(value);
  } else {
    const raw = emptyToNull(value);
    if (raw === null) {
      return { error: "Date and time are required." };
    }
    timestamp = parseDateTime(raw, clock.timeZone);
  }
  if (timestamp === null) {
    return { error: "Invalid date and time format." };
  }
  if (timestamp > toUtcIso(clock.now?.() ?? new Date())) {
    return { error: "Date and time cannot be in the future." };
  }
  return { timestamp };
}

/**
 * Check loose message fields and normalize them. Naive timestamps are
 * read as wall-clock time in `clock.timeZone`.
 *
 * @throws ValidationError listing every failing field
 */
export function validateMessageInput(
  chatRefId: number,
  input: MessageInput,
  clock: ClockOptions,
): MessageDraft {
  const errors: Record<string, string> = {};

  if (normalizeText(input.text) === null) {
    errors["text"] = "Text cannot be empty or whitespace.";
  }
  const msgId = emptyToNull(input.msgId);
  if (msgId !== null && !DIGITS.test(msgId)) {
    errors["msgId"] = "Message ID must be a positive integer.";
  }
  const link = emptyToNull(input.link);
  if (link !== null && !URL_PATTERN.test(link)) {
    errors["link"] =
      "Please enter a valid URL (starting with http:// or https://).";
  }
  const resolved = resolveTimestamp(input.timestamp, clock);
  if ("error" in resolved) {
    errors["timestamp"] = resolved.error;
  }

  if (Object.keys(errors).length > 0 || !("timestamp" in resolved)) {
    log.warn({ errors }, "Message input rejected");
    throw new ValidationError(errors);
  }
  return parseMessageInput(chatRefId, {
    ...input,
    timestamp: resolved.timestamp,
  });
}

function keep<T>(value: T | undefined, current: T): T {
  return value === undefined ? current : value;
}

/**
 * Message use cases on top of {@link MessageRepository}.
 */
export class MessageService {
  private readonly chats: ChatRepository;
  private readonly repo: MessageRepository;

  constructor(
    db: QueryExecutor,
    private readonly clock: ClockOptions,
  ) {
    this.chats = new ChatRepository(db);
    this.repo = new MessageRepository(db);
  }

  /**
   * @throws ChatNotFoundError when no chat has this slug
   */
  async listByChat(
    slug: string,
    sortBy?: string | null,
    order?: string | null,
  ): Promise<MessageWithChat[]> {
    await this.requireChat(slug);
    return this.repo.listByChat(slug, sortBy, order);
  }

  /**
   * The message with the ids of its chronological neighbours in the
   * same chat. Undated messages have no neighbours.
   *
   * @throws MessageNotFoundError
   */
  async get(id: number): Promise<MessageDetail> {
    const message = await this.requireMessage(id);
    if (message.timestamp === null) {
      return { message, previousId: null, nextId: null };
    }
    const [previous, next] = await Promise.all([
      this.repo.fetchAdjacent(message.chatRefId, message.timestamp, "previous"),
      this.repo.fetchAdjacent(message.chatRefId, message.timestamp, "next"),
    ]);
    return {
      message,
      previousId: previous?.id ?? null,
      nextId: next?.id ?? null,
    };
  }

  async create(slug: string, input: MessageInput): Promise<Message> {
    const chat = await this.requireChat(slug);
    const draft = validateMessageInput(chat.id, input, this.clock);
    const id = await this.repo.insert(draft);
    log.info({ id, chat: slug }, "Message created");
    return { id, ...draft };
  }

  /**
   * Apply the fields present in `input`; `null` clears a field.
   */
  async update(id: number, input: MessageInput): Promise<Message> {
    const current = await this.requireMessage(id);
    const draft = validateMessageInput(
      current.chatRefId,
      {
        msgId: keep(input.msgId, current.msgId),
        timestamp: keep(input.timestamp, current.timestamp),
        link: keep(input.link, current.link),
        text: keep(input.text, current.text),
        media: keep(input.media, current.media),
        screenshot: keep(input.screenshot, current.screenshot),
        tags: keep(input.tags, current.tags),
        notes: keep(input.notes, current.notes),
      },
      this.clock,
    );
    const updated: Message = { id, ...draft };
    await this.repo.update(updated);
    log.info({ id }, "Message updated");
    return updated;
  }

  async delete(id: number): Promise<Message> {
    const message = await this.requireMessage(id);
    await this.repo.delete(id);
    log.info({ id }, "Message deleted");
    return message;
  }

  private async requireChat(slug: string): Promise<Chat> {
    const chat = await this.chats.getBySlug(slug);
    if (chat === null) {
      throw new ChatNotFoundError(slug);
    }
    return chat;
  }

  private async requireMessage(id: number): Promise<Message> {
    const message = await this.repo.getById(id);
    if (message === null) {
      throw new MessageNotFoundError(id);
    }
    return message;
  }
}
