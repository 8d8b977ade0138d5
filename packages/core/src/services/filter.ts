// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import type { QueryExecutor } from "../db/adapter.js";
import { DatabaseError } from "../db/errors.js";
import { FilterRepository } from "../db/repositories/filter.js";
import { getLogger } from "../logging.js";
import { emptyToNull, toBool } from "../models/normalize.js";
import {
  DATE_MODES,
  FILTER_ACTIONS,
  type ChatMessageGroup,
  type DateMode,
  type FilterAction,
  type FilterOutcome,
  type FilterValidation,
  type MessageFilterInput,
  type MessageFilters,
  type MessageWithChat,
} from "../types/index.js";
import { parseDate } from "../utils/time.js";

const log = getLogger("filters");

export const EMPTY_FILTERS_MESSAGE = "No filters or search query applied.";

const UNKNOWN_ACTION_MESSAGE =
  "Please enter a search query, tag, or select a date filter.";

function isDateMode(value: string | null): value is DateMode {
  return DATE_MODES.some((mode) => mode === value);
}

function isFilterAction(value: string | null): value is FilterAction {
  return FILTER_ACTIONS.some((action) => action === value);
}

/**
 * Trim every field and turn blanks into null. Unknown `action` and
 * `dateMode` values are kept so that validation can report them.
 */
export function normalizeFilters(input: MessageFilterInput): MessageFilters {
  const action = emptyToNull(input.action)?.toLowerCase() ?? null;
  return {
    action: isFilterAction(action) ? action : null,
    unknownAction: isFilterAction(action) ? null : action,
    dateMode: emptyToNull(input.dateMode)?.toLowerCase() ?? null,
    startDate: emptyToNull(input.startDate),
    endDate: emptyToNull(input.endDate),
    query: emptyToNull(input.query),
    tag: emptyToNull(input.tag),
    chatSlug: emptyToNull(input.chatSlug),
    caseSensitive: toBool(input.caseSensitive),
  };
}

/**
 * True when no query, tag or date was supplied.
 */
export function isEmptyFilters(filters: MessageFilters): boolean {
  return (
    filters.query === null &&
    filters.tag === null &&
    filters.startDate === null &&
    filters.endDate === null
  );
}

/**
 * Pick an action when the caller gave none: a tag wins over a query,
 * a query over a date range. A date range needs a known mode and at
 * least one date.
 */
export function inferFilterAction(filters: MessageFilters): MessageFilters {
  if (filters.action !== null || filters.unknownAction !== null) {
    return filters;
  }
  if (filters.tag !== null) {
    return { ...filters, action: "tag" };
  }
  if (filters.query !== null) {
    return { ...filters, action: "search" };
  }
  if (
    isDateMode(filters.dateMode) &&
    (filters.startDate !== null || filters.endDate !== null)
  ) {
    return { ...filters, action: "filter" };
  }
  return filters;
}

const invalid = (message: string): FilterValidation => {
  log.warn({ reason: message }, "Filter validation failed");
  return { ok: false, message };
};

function validateDateFilters(filters: MessageFilters): FilterValidation {
  const { dateMode, startDate, endDate } = filters;
  if (!isDateMode(dateMode)) {
    return invalid("Invalid date filter mode.");
  }
  if (dateMode !== "between") {
    if (startDate === null) {
      return invalid("Please provide a valid date.");
    }
    const date = parseDate(startDate);
    if (date === null) {
      return invalid("Invalid start date format.");
    }
    return {
      ok: true,
      criteria: { kind: "date", range: { mode: dateMode, date } },
    };
  }

  if (startDate === null && endDate === null) {
    return invalid("Please provide both start and end dates.");
  }
  if (startDate === null) {
    return invalid("Start date is required.");
  }
  if (endDate === null) {
    return invalid("End date is required.");
  }
  const start = parseDate(startDate);
  const end = parseDate(endDate);
  if (start === null || end === null) {
    return invalid("Invalid date format provided.");
  }
  if (start > end) {
    return invalid("Start date must be before or equal to end date.");
  }
  return {
    ok: true,
    criteria: { kind: "date", range: { mode: "between", start, end } },
  };
}

/**
 * Turn normalized filters into search criteria, or the message that
 * explains why they cannot be applied.
 */
export function validateFilters(filters: MessageFilters): FilterValidation {
  const { action } = filters;
  if (action === null) {
    return invalid(UNKNOWN_ACTION_MESSAGE);
  }
  switch (action) {
    case "search":
      if (filters.query === null) {
        return invalid("Please enter a search query or select a date filter.");
      }
      return {
        ok: true,
        criteria: {
          kind: "search",
          query: filters.query,
          caseSensitive: filters.caseSensitive,
        },
      };
    case "tag":
      if (filters.tag === null) {
        return invalid("Please specify a tag.");
      }
      return { ok: true, criteria: { kind: "tag", tag: filters.tag } };
    case "filter":
      return validateDateFilters(filters);
    default: {
      const unhandled: never = action;
      throw new Error(`Unhandled filter action: ${String(unhandled)}`);
    }
  }
}

/**
 * Group rows by chat in order of first appearance. Rows without a chat
 * slug are skipped.
 */
export function groupMessagesByChat(
  rows: readonly MessageWithChat[],
): ChatMessageGroup[] {
  const groups = new Map<string, ChatMessageGroup>();
  for (const row of rows) {
    if (row.chatSlug === "") {
      continue;
    }
    let group = groups.get(row.chatSlug);
    if (group === undefined) {
      group = {
        chatSlug: row.chatSlug,
        chatName: row.chatName === "" ? row.chatSlug : row.chatName,
        messages: [],
      };
      groups.set(row.chatSlug, group);
    }
    group.messages.push(row);
  }
  return [...groups.values()];
}

/**
 * Resolves a search or filter request into messages.
 *
 * Never throws for bad input or a failing database: the outcome's
 * `status` says what happened and `message` what to show.
 */
export class FilterService {
  private readonly repo: FilterRepository;

  constructor(db: QueryExecutor) {
    this.repo = new FilterRepository(db);
  }

  /**
   * @param chatSlug - limits results to one chat; falls back to the
   *   filters' own `chatSlug`
   */
  async resolve(
    input: MessageFilterInput,
    sortBy?: string | null,
    order?: string | null,
    chatSlug?: string | null,
  ): Promise<FilterOutcome> {
    const filters = normalizeFilters(input);
    const scope = emptyToNull(chatSlug) ?? filters.chatSlug;

    // An explicit action is always validated, even with blank fields.
    if (filters.action === null && filters.unknownAction === null) {
      log.info(
        { fieldsGiven: !isEmptyFilters(filters) },
        "No filter action requested",
      );
      return {
        status: "empty",
        rows: [],
        message: EMPTY_FILTERS_MESSAGE,
        filters,
      };
    }

    const validation = validateFilters(filters);
    if (!validation.ok) {
      return {
        status: "invalid",
        rows: [],
        message: validation.message,
        filters,
      };
    }

    try {
      const rows = await this.repo.fetchFiltered(
        validation.criteria,
        scope,
        sortBy,
        order,
      );
      log.debug(
        { kind: validation.criteria.kind, chatSlug: scope, count: rows.length },
        "Filter resolved",
      );
      return { status: "valid", rows, message: null, filters };
    } catch (error) {
      if (!(error instanceof DatabaseError)) {
        throw error;
      }
      return {
        status: "error",
        rows: [],
        message: `Database error: ${error.message}`,
        filters,
      };
    }
  }
}
