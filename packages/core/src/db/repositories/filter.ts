// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { getLogger } from "../../logging.js";
import { parseMessageWithChatRow } from "../../models/message.js";
import type { FilterCriteria, MessageWithChat } from "../../types/index.js";
import type { QueryExecutor } from "../adapter.js";
import { buildMessageWhereClause } from "../filter-clause.js";
import { buildOrderClause } from "../order-clause.js";
import { guard } from "./guard.js";
import { MESSAGE_COLUMNS, MESSAGE_SORT } from "./message.js";

const log = getLogger("filter-repository");

/**
 * Message search across all chats or within one.
 */
export class FilterRepository {
  constructor(private readonly db: QueryExecutor) {}

  /**
   * Messages matching `criteria`, optionally limited to the chat with
   * slug `chatSlug`. A null criteria matches every message.
   */
  async fetchFiltered(
    criteria: FilterCriteria | null,
    chatSlug: string | null = null,
    sortBy?: string | null,
    order?: string | null,
  ): Promise<MessageWithChat[]> {
    const where = buildMessageWhereClause(criteria, this.db.dialect, chatSlug);
    const orderClause = buildOrderClause(sortBy, order, MESSAGE_SORT);
    const rows = await guard(this.db, "filter messages", () =>
      this.db.selectAll(
        `SELECT ${MESSAGE_COLUMNS}, c.name AS chat_name, c.slug AS chat_slug
         FROM messages m
         JOIN chats c ON m.chat_ref_id = c.id
         ${where.sql}
         ${orderClause}`,
        where.params,
      ),
    );
    log.debug(
      { kind: criteria?.kind ?? null, chatSlug, count: rows.length },
      "Filtered messages",
    );
    return rows.map(parseMessageWithChatRow);
  }
}
