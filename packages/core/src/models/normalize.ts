// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { getLogger } from "../logging.js";
import { parseDate } from "../utils/time.js";

export type TagSource = "json" | "csv" | "list" | "empty";

export interface ParsedTags {
  tags: string[];
  source: TagSource;
}

const TRUE_STRINGS = new Set(["1", "true", "on", "yes"]);

const INTEGER_PATTERN = /^[+-]?\d+$/;

const JOINED_PATTERN = /^(\d{4}-\d{2}-\d{2})(?:[T ].*)?$/;

/**
 * Strict boolean coercion: `true`, `1` and the strings `"1"`, `"true"`,
 * `"on"`, `"yes"` are true; everything else is false.
 */
export function toBool(value: unknown): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return value === 1;
  }
  if (typeof value === "string") {
    return TRUE_STRINGS.has(value.trim().toLowerCase());
  }
  return false;
}

/**
 * Integer or `null`. Never throws: blank, fractional strings and
 * non-numeric values yield `null`. PostgreSQL `BIGINT`/`COUNT` values
 * arrive as decimal strings and are accepted.
 */
export function toIntOrNull(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === "bigint") {
    const converted = Number(value);
    return Number.isSafeInteger(converted) ? converted : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
      return null;
    }
    const converted = Number(trimmed);
    return Number.isSafeInteger(converted) ? converted : null;
  }
  return null;
}

/**
 * Trimmed text, or `null` when blank or not a scalar.
 */
export function emptyToNull(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? null : trimmed;
  }
  if (typeof value === "number" || typeof value === "bigint") {
    return String(value);
  }
  return null;
}

/**
 * Message body: outer whitespace trimmed, inner line breaks kept,
 * Windows line endings folded to `\n`.
 */
export function normalizeText(value: unknown): string | null {
  const text = emptyToNull(value);
  return text === null ? null : text.replace(/\r\n?/g, "\n");
}

function cleanList(items: readonly unknown[]): string[] {
  const result: string[] = [];
  for (const item of items) {
    if (typeof item === "string") {
      const trimmed = item.trim();
      if (trimmed !== "") {
        result.push(trimmed);
      }
    }
  }
  return result;
}

/**
 * Parse a tag list from an array, a JSON array string or a
 * comma-separated string, reporting which form was recognised.
 */
export function parseTagsDetailed(value: unknown): ParsedTags {
  if (Array.isArray(value)) {
    return { tags: cleanList(value), source: "list" };
  }
  if (typeof value !== "string") {
    return { tags: [], source: "empty" };
  }
  const trimmed = value.trim();
  if (trimmed === "") {
    return { tags: [], source: "empty" };
  }

  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (Array.isArray(parsed)) {
      return { tags: cleanList(parsed), source: "json" };
    }
  } catch (error) {
    if (!(error instanceof SyntaxError)) {
      throw error;
    }
    getLogger("models").debug(
      { value: trimmed },
      "Tags are not JSON, splitting on commas",
    );
  }
  return { tags: cleanList(trimmed.split(",")), source: "csv" };
}

export function parseTags(value: unknown): string[] {
  return parseTagsDetailed(value).tags;
}

/**
 * Media references parse like tags, then drop repeats keeping the first.
 */
export function parseMedia(value: unknown): string[] {
  return [...new Set(parseTags(value))];
}

/**
 * Calendar date from a `Date`, `YYYY-MM-DD` or a longer ISO string.
 *
 * `pg` hands `DATE` columns over as a `Date` at local midnight, so the
 * local calendar fields are read rather than the UTC ones.
 */
export function parseJoined(value: unknown): string | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return null;
    }
    const month = String(value.getMonth() + 1).padStart(2, "0");
    const day = String(value.getDate()).padStart(2, "0");
    return `${String(value.getFullYear()).padStart(4, "0")}-${month}-${day}`;
  }
  if (typeof value === "string") {
    const match = JOINED_PATTERN.exec(value.trim());
    return match === null ? null : parseDate(match[1]);
  }
  return null;
}
