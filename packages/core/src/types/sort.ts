// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

export type SortOrder = "asc" | "desc";

/**
 * Allow-list and defaults for one sortable view.
 */
export interface SortConfig {
  /** Column names or aliases callers may sort by. */
  allowedFields: readonly string[];
  defaultField: string;
  defaultOrder?: SortOrder;
  /** Qualifier prepended to the field, e.g. `"m."`. */
  prefix?: string;
  /** Fields whose NULLs sort last in both directions. */
  nullableFields?: readonly string[];
  /** Expression appended ascending after the primary key for stable paging. */
  tieBreaker?: string;
}

export interface SortParams {
  field: string;
  order: SortOrder;
}
