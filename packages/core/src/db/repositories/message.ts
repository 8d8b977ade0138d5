// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { getLogger } from "../../logging.js";
import {
  messageToRecord,
  parseMessageRow,
  parseMessageWithChatRow,
} from "../../models/message.js";
import { toIntOrNull } from "../../models/normalize.js";
import type {
  AdjacentDirection,
  Message,
  MessageDraft,
  MessageWithChat,
  SortConfig,
} from "../../types/index.js";
import type { QueryExecutor, SqlParam, UniqueViolation } from "../adapter.js";
import {
  DuplicateMessageError,
  MessageNotFoundError,
  MissingPrimaryKeyError,
} from "../errors.js";
import { buildOrderClause } from "../order-clause.js";
import { guard, violates } from "./guard.js";

const log = getLogger("message-repository");

export const MESSAGE_COLUMNS = `m.id, m.chat_ref_id, m.msg_id, m.timestamp, m.link,
       m.text, m.media, m.screenshot, m.tags, m.notes`;

export const MESSAGE_SORT: SortConfig = {
  allowedFields: ["timestamp", "msg_id"],
  defaultField: "timestamp",
  defaultOrder: "desc",
  prefix: "m.",
  nullableFields: ["timestamp", "msg_id"],
  tieBreaker: "m.id",
};

function toParams(message: MessageDraft): SqlParam[] {
  const record = messageToRecord(message);
  return [
    record.chat_ref_id,
    record.msg_id,
    record.timestamp,
    record.link,
    record.text,
    record.media,
    record.screenshot,
    record.tags,
    record.notes,
  ];
}

function duplicateError(
  message: MessageDraft,
): (violation: UniqueViolation) => DuplicateMessageError | null {
  return (violation) =>
    violates(violation, "msg_id") && message.msgId !== null
      ? new DuplicateMessageError(message.chatRefId, message.msgId)
      : null;
}

/**
 * Message persistence. `(chat_ref_id, msg_id)` is unique when `msg_id`
 * is set; a clash surfaces as {@link DuplicateMessageError}.
 */
export class MessageRepository {
  constructor(private readonly db: QueryExecutor) {}

  /**
   * Messages of the chat with the given slug, joined with the chat's
   * name. Sortable by `timestamp` (default, newest first) or `msg_id`.
   */
  async listByChat(
    slug: string,
    sortBy?: string | null,
    order?: string | null,
  ): Promise<MessageWithChat[]> {
    const orderClause = buildOrderClause(sortBy, order, MESSAGE_SORT);
    const rows = await guard(this.db, "list messages", () =>
      this.db.selectAll(
        `SELECT ${MESSAGE_COLUMNS}, c.name AS chat_name, c.slug AS chat_slug
         FROM messages m
         JOIN chats c ON m.chat_ref_id = c.id
         WHERE c.slug = ?
         ${orderClause}`,
        [slug],
      ),
    );
    log.debug({ slug, count: rows.length }, "Listed messages");
    return rows.map(parseMessageWithChatRow);
  }

  async getById(id: number): Promise<Message | null> {
    const row = await guard(this.db, "get message", () =>
      this.db.selectOne(
        `SELECT ${MESSAGE_COLUMNS} FROM messages m WHERE m.id = ?`,
        [id],
      ),
    );
    return row === undefined ? null : parseMessageRow(row);
  }

  async insert(message: MessageDraft): Promise<number> {
    const id = await guard(
      this.db,
      "insert message",
      () =>
        this.db.insert(
          `INSERT INTO messages
             (chat_ref_id, msg_id, timestamp, link, text, media,
              screenshot, tags, notes)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
          toParams(message),
        ),
      duplicateError(message),
    );
    if (id === null) {
      throw new MissingPrimaryKeyError("messages");
    }
    log.debug({ id, chatRefId: message.chatRefId }, "Inserted message");
    return id;
  }

  async update(message: Message): Promise<void> {
    await guard(
      this.db,
      "update message",
      async () => {
        const changes = await this.db.execute(
          `UPDATE messages
           SET chat_ref_id = ?, msg_id = ?, timestamp = ?, link = ?, text = ?,
               media = ?, screenshot = ?, tags = ?, notes = ?
           WHERE id = ?`,
          [...toParams(message), message.id],
        );
        if (changes === 0) {
          throw new MessageNotFoundError(message.id);
        }
      },
      duplicateError(message),
    );
    log.debug({ id: message.id }, "Updated message");
  }

  async delete(id: number): Promise<void> {
    await guard(this.db, "delete message", async () => {
      const changes = await this.db.execute(
        "DELETE FROM messages WHERE id = ?",
        [id],
      );
      if (changes === 0) {
        throw new MessageNotFoundError(id);
      }
    });
    log.debug({ id }, "Deleted message");
  }

  async existsByExternalId(
    chatRefId: number,
    msgId: number,
    excludingId?: number,
  ): Promise<boolean> {
    const params: SqlParam[] = [chatRefId, msgId];
    let sql =
      "SELECT 1 AS found FROM messages WHERE chat_ref_id = ? AND msg_id = ?";
    if (excludingId !== undefined) {
      sql += " AND id <> ?";
      params.push(excludingId);
    }
    const row = await guard(this.db, "check message existence", () =>
      this.db.selectOne(sql, params),
    );
    return row !== undefined;
  }

  async countByChat(chatRefId: number): Promise<number> {
    const row = await guard(this.db, "count messages", () =>
      this.db.selectOne(
        "SELECT COUNT(*) AS total FROM messages WHERE chat_ref_id = ?",
        [chatRefId],
      ),
    );
    return toIntOrNull(row?.["total"]) ?? 0;
  }

  /**
   * The message immediately before or after `timestamp` in the same
   * chat. The reference timestamp itself is excluded.
   */
  async fetchAdjacent(
    chatRefId: number,
    timestamp: string,
    direction: AdjacentDirection,
  ): Promise<Message | null> {
    const [comparator, order] =
      direction === "previous" ? ["<", "DESC"] : [">", "ASC"];
    const column = this.db.dialect.timestamp("m.timestamp");
    const row = await guard(this.db, "fetch adjacent message", () =>
      this.db.selectOne(
        `SELECT ${MESSAGE_COLUMNS}
         FROM messages m
         WHERE m.chat_ref_id = ?
           AND ${column} ${comparator} ${this.db.dialect.timestampParam()}
         ORDER BY ${column} ${order}, m.id ${order}
         LIMIT 1`,
        [chatRefId, timestamp],
      ),
    );
    return row === undefined ? null : parseMessageRow(row);
  }
}
