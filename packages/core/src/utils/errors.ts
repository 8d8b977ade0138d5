// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

/**
 * Thrown by the strict timestamp parsers when a value is not a
 * zone-qualified ISO-8601 timestamp or calendar date.
 */
export class TimeParseError extends Error {
  readonly input: string;

  constructor(message: string, input: string) {
    super(message);
    this.name = "TimeParseError";
    this.input = input;
  }
}
