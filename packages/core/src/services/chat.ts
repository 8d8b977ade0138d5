// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import type { QueryExecutor } from "../db/adapter.js";
import { ChatNotFoundError } from "../db/errors.js";
import { ChatRepository } from "../db/repositories/chat.js";
import { getLogger } from "../logging.js";
import { parseChatInput } from "../models/chat.js";
import { emptyToNull, parseJoined } from "../models/normalize.js";
import type {
  ArchiveStats,
  Chat,
  ChatDraft,
  ChatInput,
  ChatSummary,
} from "../types/index.js";
import { resolveUniqueSlug, slugify } from "../utils/slug.js";
import { parseDate, todayIso } from "../utils/time.js";
import { ValidationError } from "./errors.js";

const log = getLogger("chat-service");

const URL_PATTERN = /^https?:\/\/\S+$/i;
const DIGITS = /^\d+$/;

export interface ClockOptions {
  /** IANA zone that decides what "today" is. */
  timeZone: string;
  /** Defaults to the system clock. */
  now?: () => Date;
}

function joinedError(value: ChatInput["joined"], today: string): string | null {
  let joined: string | null;
  if (value instanceof Date) {
    joined = parseJoined(value);
  } else {
    const raw = emptyToNull(value);
    if (raw === null) {
      return null;
    }
    joined = parseDate(raw);
  }
  if (joined === null) {
    return "Join date must be in YYYY-MM-DD format.";
  }
  return joined > today ? "Join date cannot be in the future." : null;
}

/**
 * Check loose chat fields and normalize them.
 *
 * @throws ValidationError listing every failing field
 */
export function validateChatInput(
  input: ChatInput,
  clock: ClockOptions,
): ChatDraft {
  const errors: Record<string, string> = {};

  if (emptyToNull(input.name) === null) {
    errors["name"] = "Chat name is required.";
  }
  const chatId = emptyToNull(input.chatId);
  if (chatId !== null && !DIGITS.test(chatId)) {
    errors["chatId"] = "Chat ID must be an integer.";
  }
  const link = emptyToNull(input.link);
  if (link !== null && !URL_PATTERN.test(link)) {
    errors["link"] =
      "Please enter a valid URL (starting with http:// or https://).";
  }
  const today = todayIso(clock.timeZone, clock.now?.() ?? new Date());
  const joined = joinedError(input.joined, today);
  if (joined !== null) {
    errors["joined"] = joined;
  }

  if (Object.keys(errors).length > 0) {
    log.warn({ errors }, "Chat input rejected");
    throw new ValidationError(errors);
  }
  return parseChatInput(input);
}

function keep<T>(value: T | undefined, current: T): T {
  return value === undefined ? current : value;
}

/**
 * Chat use cases on top of {@link ChatRepository}: validation, slug
 * assignment and lookups by slug.
 */
export class ChatService {
  private readonly repo: ChatRepository;

  constructor(
    db: QueryExecutor,
    private readonly clock: ClockOptions,
  ) {
    this.repo = new ChatRepository(db);
  }

  async list(
    sortBy?: string | null,
    order?: string | null,
  ): Promise<ChatSummary[]> {
    return this.repo.list(sortBy, order);
  }

  /**
   * @throws ChatNotFoundError when no chat has this slug
   */
  async getBySlug(slug: string): Promise<Chat> {
    const chat = await this.repo.getBySlug(slug);
    if (chat === null) {
      throw new ChatNotFoundError(slug);
    }
    return chat;
  }

  /**
   * Validate, derive a free slug from the name and insert.
   */
  async create(input: ChatInput): Promise<Chat> {
    const draft = validateChatInput(input, this.clock);
    const slug = await resolveUniqueSlug(slugify(draft.name), draft.name, (s) =>
      this.repo.existsBySlug(s),
    );
    const id = await this.repo.insert({ slug, ...draft });
    log.info({ id, slug }, "Chat created");
    return { id, slug, ...draft };
  }

  /**
   * Apply the fields present in `input`; `null` clears a field. The
   * slug is derived again only when the name changes.
   */
  async update(slug: string, input: ChatInput): Promise<Chat> {
    const current = await this.getBySlug(slug);
    const draft = validateChatInput(
      {
        name: keep(input.name, current.name),
        chatId: keep(input.chatId, current.chatId),
        link: keep(input.link, current.link),
        type: keep(input.type, current.type),
        image: keep(input.image, current.image),
        joined: keep(input.joined, current.joined),
        isActive: keep(input.isActive, current.isActive),
        isMember: keep(input.isMember, current.isMember),
        isPublic: keep(input.isPublic, current.isPublic),
        notes: keep(input.notes, current.notes),
      },
      this.clock,
    );

    let nextSlug = current.slug;
    if (draft.name !== current.name) {
      nextSlug = await resolveUniqueSlug(
        slugify(draft.name),
        draft.name,
        (s) => this.repo.existsBySlug(s, current.id),
      );
    }

    const updated: Chat = { id: current.id, slug: nextSlug, ...draft };
    await this.repo.update(updated);
    log.info({ id: current.id, slug: nextSlug }, "Chat updated");
    return updated;
  }

  /**
   * Delete the chat and all of its messages.
   */
  async delete(slug: string): Promise<Chat> {
    const chat = await this.getBySlug(slug);
    await this.repo.delete(chat.id);
    log.info({ id: chat.id, slug }, "Chat deleted");
    return chat;
  }

  async stats(): Promise<ArchiveStats> {
    return this.repo.globalStats();
  }
}
