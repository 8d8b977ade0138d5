// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { getLogger } from "../logging.js";
import type { SortConfig, SortOrder, SortParams } from "../types/index.js";

const ORDERS: ReadonlySet<string> = new Set<SortOrder>(["asc", "desc"]);

function isSortOrder(value: string): value is SortOrder {
  return ORDERS.has(value);
}

/**
 * Validate a requested sort against the view's allow-list, falling
 * back to the configured defaults. Order matching ignores case.
 */
export function normalizeSortParams(
  sortBy: string | null | undefined,
  order: string | null | undefined,
  config: SortConfig,
): SortParams {
  const log = getLogger("sort");
  const defaultOrder = config.defaultOrder ?? "desc";

  let field = config.defaultField;
  if (sortBy) {
    if (config.allowedFields.includes(sortBy)) {
      field = sortBy;
    } else {
      log.warn(
        { sortBy, fallback: config.defaultField },
        "Invalid sort field, using default",
      );
    }
  }

  let direction = defaultOrder;
  if (order) {
    const lowered = order.trim().toLowerCase();
    if (isSortOrder(lowered)) {
      direction = lowered;
    } else {
      log.warn(
        { order, fallback: defaultOrder },
        "Invalid sort order, using default",
      );
    }
  }

  return { field, order: direction };
}

/**
 * Render `ORDER BY <prefix><field> ASC|DESC [NULLS LAST]`. The field
 * always comes from the allow-list, never from the caller's text.
 */
export function buildOrderClause(
  sortBy: string | null | undefined,
  order: string | null | undefined,
  config: SortConfig,
): string {
  const { field, order: direction } = normalizeSortParams(
    sortBy,
    order,
    config,
  );
  let clause = `ORDER BY ${config.prefix ?? ""}${field} ${direction.toUpperCase()}`;
  if (config.nullableFields?.includes(field)) {
    clause += " NULLS LAST";
  }
  if (config.tieBreaker !== undefined) {
    clause += `, ${config.tieBreaker} ASC`;
  }
  return clause;
}
