// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import type { MessageWithChat } from "./message.js";

export const FILTER_ACTIONS = ["search", "filter", "tag"] as const;
export type FilterAction = (typeof FILTER_ACTIONS)[number];

export const DATE_MODES = ["on", "before", "after", "between"] as const;
export type DateMode = (typeof DATE_MODES)[number];

/**
 * Raw filter parameters as supplied by a caller.
 */
export interface MessageFilterInput {
  action?: string | null | undefined;
  dateMode?: string | null | undefined;
  startDate?: string | null | undefined;
  endDate?: string | null | undefined;
  query?: string | null | undefined;
  tag?: string | null | undefined;
  chatSlug?: string | null | undefined;
  caseSensitive?: boolean | string | null | undefined;
}

/**
 * Normalized filter state: trimmed, blanks absent. An unrecognized
 * action lands in `unknownAction`; `dateMode` keeps unrecognized values.
 * Both are kept so validation can report them.
 */
export interface MessageFilters {
  action: FilterAction | null;
  unknownAction: string | null;
  dateMode: string | null;
  startDate: string | null;
  endDate: string | null;
  query: string | null;
  tag: string | null;
  chatSlug: string | null;
  caseSensitive: boolean;
}

export type DateRange =
  | { mode: "on" | "before" | "after"; date: string }
  | { mode: "between"; start: string; end: string };

/**
 * A validated filter, ready to be rendered into SQL.
 */
export type FilterCriteria =
  | { kind: "search"; query: string; caseSensitive: boolean }
  | { kind: "tag"; tag: string }
  | { kind: "date"; range: DateRange };

export type FilterValidation =
  | { ok: true; criteria: FilterCriteria }
  | { ok: false; message: string };

export type FilterStatus = "empty" | "invalid" | "valid" | "error";

/**
 * Result of resolving a filter request. Only `valid` carries rows;
 * the other statuses carry the message to show instead.
 */
export type FilterOutcome =
  | {
      status: "valid";
      rows: MessageWithChat[];
      message: null;
      filters: MessageFilters;
    }
  | {
      status: Exclude<FilterStatus, "valid">;
      rows: MessageWithChat[];
      message: string;
      filters: MessageFilters;
    };

export interface ChatMessageGroup {
  chatSlug: string;
  chatName: string;
  messages: MessageWithChat[];
}
