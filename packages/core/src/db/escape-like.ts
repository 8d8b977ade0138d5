// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

/**
 * SQL text that follows a LIKE pattern so backslash escapes apply.
 * Both SQLite and PostgreSQL read `'\'` as a one-character literal.
 */
export const LIKE_ESCAPE = "ESCAPE '\\'";

/**
 * Escapes SQL LIKE wildcard characters (`%` and `_`) in user input
 * so they are treated as literals.
 *
 * Must be used with {@link LIKE_ESCAPE} in the LIKE clause.
 */
export function escapeLike(input: string): string {
  return input.replace(/[%_\\]/g, (ch) => `\\${ch}`);
}

/**
 * LIKE pattern matching `input` anywhere in the value.
 */
export function containsPattern(input: string): string {
  return `%${escapeLike(input)}%`;
}
