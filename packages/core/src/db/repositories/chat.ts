// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { getLogger } from "../../logging.js";
import {
  chatToRecord,
  parseChatRow,
  parseChatSummaryRow,
} from "../../models/chat.js";
import { emptyToNull, toIntOrNull } from "../../models/normalize.js";
import type {
  ArchiveStats,
  Chat,
  ChatSummary,
  SortConfig,
} from "../../types/index.js";
import { tryParseUtcTimestamp } from "../../utils/time.js";
import type {
  QueryExecutor,
  SqlParam,
  SqlRow,
  UniqueViolation,
} from "../adapter.js";
import {
  ChatNotFoundError,
  DuplicateChatIdError,
  DuplicateSlugError,
  MissingPrimaryKeyError,
} from "../errors.js";
import { buildOrderClause } from "../order-clause.js";
import { guard, violates } from "./guard.js";

const log = getLogger("chat-repository");

const CHAT_COLUMNS = `c.id, c.slug, c.chat_id, c.name, c.link, c.type, c.image,
       c.joined, c.is_active, c.is_member, c.is_public, c.notes`;

export const CHAT_SORT: SortConfig = {
  allowedFields: ["name", "message_count", "last_message"],
  defaultField: "last_message",
  defaultOrder: "desc",
  nullableFields: ["last_message"],
  tieBreaker: "c.id",
};

interface StatsRow {
  [column: string]: unknown;
  total_chats: unknown;
  total_messages: unknown;
  media_messages: unknown;
  most_active_name: unknown;
  most_active_slug: unknown;
  most_active_count: unknown;
  last_message_id: unknown;
  last_message_timestamp: unknown;
  last_message_chat_name: unknown;
  last_message_chat_slug: unknown;
}

function toParams(chat: Omit<Chat, "id">): SqlParam[] {
  const record = chatToRecord(chat);
  return [
    record.slug,
    record.chat_id,
    record.name,
    record.link,
    record.type,
    record.image,
    record.joined,
    record.is_active,
    record.is_member,
    record.is_public,
    record.notes,
  ];
}

/**
 * Chat persistence on either backend. Unique violations surface as
 * {@link DuplicateSlugError} / {@link DuplicateChatIdError}.
 */
export class ChatRepository {
  constructor(private readonly db: QueryExecutor) {}

  /**
   * All chats with message count and latest message time. Sortable by
   * `name`, `message_count` or `last_message` (default, newest first,
   * chats without messages last).
   */
  async list(
    sortBy?: string | null,
    order?: string | null,
  ): Promise<ChatSummary[]> {
    const orderClause = buildOrderClause(sortBy, order, CHAT_SORT);
    const rows = await guard(this.db, "list chats", () =>
      this.db.selectAll(
        `SELECT ${CHAT_COLUMNS},
           (SELECT COUNT(*) FROM messages m WHERE m.chat_ref_id = c.id) AS message_count,
           (SELECT MAX(m.timestamp) FROM messages m WHERE m.chat_ref_id = c.id) AS last_message
         FROM chats c
         ${orderClause}`,
      ),
    );
    return rows.map(parseChatSummaryRow);
  }

  async getBySlug(slug: string): Promise<Chat | null> {
    const row = await guard(this.db, "get chat", () =>
      this.db.selectOne(`SELECT ${CHAT_COLUMNS} FROM chats c WHERE c.slug = ?`, [
        slug,
      ]),
    );
    return row === undefined ? null : parseChatRow(row);
  }

  async getById(id: number): Promise<Chat | null> {
    const row = await guard(this.db, "get chat", () =>
      this.db.selectOne(`SELECT ${CHAT_COLUMNS} FROM chats c WHERE c.id = ?`, [
        id,
      ]),
    );
    return row === undefined ? null : parseChatRow(row);
  }

  async insert(chat: Omit<Chat, "id">): Promise<number> {
    const id = await guard(
      this.db,
      "insert chat",
      () =>
        this.db.insert(
          `INSERT INTO chats
             (slug, chat_id, name, link, type, image, joined,
              is_active, is_member, is_public, notes)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
          toParams(chat),
        ),
      (violation) => this.duplicateError(violation, chat),
    );
    if (id === null) {
      throw new MissingPrimaryKeyError("chats");
    }
    log.debug({ id, slug: chat.slug }, "Inserted chat");
    return id;
  }

  async update(chat: Chat): Promise<void> {
    await guard(
      this.db,
      "update chat",
      async () => {
        const changes = await this.db.execute(
          `UPDATE chats
           SET slug = ?, chat_id = ?, name = ?, link = ?, type = ?, image = ?,
               joined = ?, is_active = ?, is_member = ?, is_public = ?, notes = ?
           WHERE id = ?`,
          [...toParams(chat), chat.id],
        );
        if (changes === 0) {
          throw new ChatNotFoundError(chat.id);
        }
      },
      (violation) => this.duplicateError(violation, chat),
    );
    log.debug({ id: chat.id, slug: chat.slug }, "Updated chat");
  }

  /**
   * Delete a chat and its messages in one transaction. The schema also
   * cascades; the explicit delete covers connections with foreign keys
   * disabled.
   */
  async delete(id: number): Promise<void> {
    const removed = await guard(this.db, "delete chat", () =>
      this.db.transaction(async (tx) => {
        const messages = await tx.execute(
          "DELETE FROM messages WHERE chat_ref_id = ?",
          [id],
        );
        const chats = await tx.execute("DELETE FROM chats WHERE id = ?", [id]);
        if (chats === 0) {
          throw new ChatNotFoundError(id);
        }
        return messages;
      }),
    );
    log.debug({ id, messages: removed }, "Deleted chat");
  }

  async existsBySlug(slug: string, excludingId?: number): Promise<boolean> {
    return this.exists("slug", slug, excludingId);
  }

  async existsByExternalId(
    chatId: number,
    excludingId?: number,
  ): Promise<boolean> {
    return this.exists("chat_id", chatId, excludingId);
  }

  /**
   * Archive-wide counters: chats, messages, messages with media, the
   * chat with most messages and the newest message.
   */
  async globalStats(): Promise<ArchiveStats> {
    const withMedia = this.db.dialect.nonEmptyArray("media");
    const row = await guard(this.db, "compute statistics", () =>
      this.db.selectOne<StatsRow>(
        `WITH most_active AS (
           SELECT chat_ref_id, COUNT(*) AS msg_count
           FROM messages
           GROUP BY chat_ref_id
           ORDER BY msg_count DESC, chat_ref_id ASC
           LIMIT 1
         ),
         last_msg AS (
           SELECT id, timestamp, chat_ref_id
           FROM messages
           WHERE timestamp IS NOT NULL
           ORDER BY timestamp DESC, id DESC
           LIMIT 1
         )
         SELECT
           (SELECT COUNT(*) FROM chats) AS total_chats,
           (SELECT COUNT(*) FROM messages) AS total_messages,
           (SELECT COUNT(*) FROM messages WHERE ${withMedia}) AS media_messages,
           (SELECT name FROM chats WHERE id = (SELECT chat_ref_id FROM most_active)) AS most_active_name,
           (SELECT slug FROM chats WHERE id = (SELECT chat_ref_id FROM most_active)) AS most_active_slug,
           (SELECT msg_count FROM most_active) AS most_active_count,
           (SELECT id FROM last_msg) AS last_message_id,
           (SELECT timestamp FROM last_msg) AS last_message_timestamp,
           (SELECT name FROM chats WHERE id = (SELECT chat_ref_id FROM last_msg)) AS last_message_chat_name,
           (SELECT slug FROM chats WHERE id = (SELECT chat_ref_id FROM last_msg)) AS last_message_chat_slug`,
      ),
    );
    return parseStatsRow(row);
  }

  private async exists(
    column: "slug" | "chat_id",
    value: SqlParam,
    excludingId: number | undefined,
  ): Promise<boolean> {
    const params: SqlParam[] = [value];
    let sql = `SELECT 1 AS found FROM chats WHERE ${column} = ?`;
    if (excludingId !== undefined) {
      sql += " AND id <> ?";
      params.push(excludingId);
    }
    const row = await guard(this.db, "check chat existence", () =>
      this.db.selectOne<SqlRow>(sql, params),
    );
    return row !== undefined;
  }

  private duplicateError(
    violation: UniqueViolation,
    chat: Omit<Chat, "id">,
  ): DuplicateSlugError | DuplicateChatIdError | null {
    if (violates(violation, "slug")) {
      return new DuplicateSlugError(chat.slug);
    }
    if (violates(violation, "chat_id")) {
      return new DuplicateChatIdError(chat.chatId);
    }
    return null;
  }
}

function parseStatsRow(row: StatsRow | undefined): ArchiveStats {
  const activeSlug = emptyToNull(row?.most_active_slug);
  const lastId = toIntOrNull(row?.last_message_id);
  return {
    totalChats: toIntOrNull(row?.total_chats) ?? 0,
    totalMessages: toIntOrNull(row?.total_messages) ?? 0,
    mediaMessages: toIntOrNull(row?.media_messages) ?? 0,
    mostActiveChat:
      activeSlug === null
        ? null
        : {
            name: emptyToNull(row?.most_active_name) ?? "",
            slug: activeSlug,
            messageCount: toIntOrNull(row?.most_active_count) ?? 0,
          },
    lastMessage:
      lastId === null
        ? null
        : {
            id: lastId,
            timestamp: tryParseUtcTimestamp(row?.last_message_timestamp),
            chatName: emptyToNull(row?.last_message_chat_name) ?? "",
            chatSlug: emptyToNull(row?.last_message_chat_slug) ?? "",
          },
  };
}
