// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

export { errorMessage } from "./error-message.js";
export { TimeParseError } from "./errors.js";
export {
  resolveUniqueSlug,
  SlugGenerationError,
  slugify,
  transliterate,
} from "./slug.js";
export {
  dayBounds,
  formatDate,
  formatTimestamp,
  fromUtcIso,
  isValidTimeZone,
  parseDate,
  parseDateTime,
  todayIso,
  toUtcIso,
  tryParseUtcTimestamp,
  type DateStyle,
  type DayBounds,
  type TimestampStyle,
} from "./time.js";
