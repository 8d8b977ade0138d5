// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { getLogger } from "../logging.js";
import { TimeParseError } from "./errors.js";

/**
 * Display styles accepted by {@link formatTimestamp}.
 */
export type TimestampStyle = "datetime" | "date" | "long_date" | "time";

/**
 * Display styles accepted by {@link formatDate}.
 */
export type DateStyle = "long_date" | "short_date";

export interface DayBounds {
  /** `YYYY-MM-DDT00:00:00Z` */
  start: string;
  /** `YYYY-MM-DDT23:59:59Z` */
  end: string;
}

interface DateTimeFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const DAY_FIRST_PATTERN =
  /^(\d{1,2})[./](\d{1,2})[./](\d{4})(?:[T ,]+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

const MS_PER_MINUTE = 60_000;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (formatter === undefined) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function fieldsToUtcMs(fields: DateTimeFields): number {
  const date = new Date(0);
  date.setUTCFullYear(fields.year, fields.month - 1, fields.day);
  date.setUTCHours(fields.hour, fields.minute, fields.second, 0);
  return date.getTime();
}

function isValidFields(fields: DateTimeFields): boolean {
  if (
    fields.month < 1 ||
    fields.month > 12 ||
    fields.day < 1 ||
    fields.hour > 23 ||
    fields.minute > 59 ||
    fields.second > 59
  ) {
    return false;
  }
  const candidate = new Date(fieldsToUtcMs(fields));
  return (
    candidate.getUTCFullYear() === fields.year &&
    candidate.getUTCMonth() === fields.month - 1 &&
    candidate.getUTCDate() === fields.day
  );
}

/**
 * Wall-clock fields of an instant as seen in `timeZone`.
 */
function zonedFields(utcMs: number, timeZone: string): DateTimeFields {
  const parts = formatterFor(timeZone).formatToParts(new Date(utcMs));
  const read = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((part) => part.type === type)?.value ?? "0");
  return {
    year: read("year"),
    month: read("month"),
    day: read("day"),
    hour: read("hour"),
    minute: read("minute"),
    second: read("second"),
  };
}

function zoneOffsetMs(utcMs: number, timeZone: string): number {
  const wholeSecond = Math.floor(utcMs / 1000) * 1000;
  return fieldsToUtcMs(zonedFields(wholeSecond, timeZone)) - wholeSecond;
}

/**
 * Interpret naive wall-clock fields in `timeZone`. Non-existent local
 * times (spring-forward gap) resolve with the offset in force before
 * the transition.
 */
function localToUtcMs(fields: DateTimeFields, timeZone: string): number {
  const asUtc = fieldsToUtcMs(fields);
  const firstOffset = zoneOffsetMs(asUtc, timeZone);
  const candidate = asUtc - firstOffset;
  const secondOffset = zoneOffsetMs(candidate, timeZone);
  return secondOffset === firstOffset ? candidate : asUtc - secondOffset;
}

function parseOffsetMinutes(zone: string): number | null {
  if (zone.toUpperCase() === "Z") {
    return 0;
  }
  const match = /^([+-])(\d{2}):?(\d{2})?$/.exec(zone);
  if (match === null) {
    return null;
  }
  const hours = Number(match[2]);
  const minutes = Number(match[3] ?? "0");
  if (hours > 23 || minutes > 59) {
    return null;
  }
  const sign = match[1] === "-" ? -1 : 1;
  return sign * (hours * 60 + minutes);
}

function matchIso(
  text: string,
): { fields: DateTimeFields; zone: string | undefined } | null {
  const match = ISO_PATTERN.exec(text);
  if (match === null) {
    return null;
  }
  const fields: DateTimeFields = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4] ?? "0"),
    minute: Number(match[5] ?? "0"),
    second: Number(match[6] ?? "0"),
  };
  if (!isValidFields(fields)) {
    return null;
  }
  return { fields, zone: match[7] };
}

/**
 * Whether `timeZone` names a zone known to the runtime's ICU data.
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}

/**
 * Canonical storage form: UTC, second precision, `Z` suffix.
 */
export function toUtcIso(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new TimeParseError("Invalid date", String(date));
  }
  return `${date.toISOString().slice(0, 19)}Z`;
}

/**
 * Strictly parse a zone-qualified ISO-8601 timestamp.
 *
 * @throws TimeParseError when the text is malformed or carries no zone
 */
export function fromUtcIso(text: string): Date {
  const trimmed = text.trim();
  const parsed = matchIso(trimmed);
  if (parsed === null) {
    throw new TimeParseError(`Invalid ISO-8601 timestamp: ${text}`, text);
  }
  if (parsed.zone === undefined) {
    throw new TimeParseError(
      `Timestamp must include a time zone: ${text}`,
      text,
    );
  }
  const offset = parseOffsetMinutes(parsed.zone);
  if (offset === null) {
    throw new TimeParseError(`Invalid time zone offset: ${text}`, text);
  }
  return new Date(fieldsToUtcMs(parsed.fields) - offset * MS_PER_MINUTE);
}

/**
 * Lenient normalization used when hydrating stored values: accepts a
 * `Date` or a zoned ISO string and yields the canonical UTC form, or
 * `null` (with a warning) for anything else.
 */
export function tryParseUtcTimestamp(value: unknown): string | null {
  if (value === null || value === undefined || value === "") {
    return null;
  }
  try {
    if (value instanceof Date) {
      return toUtcIso(value);
    }
    if (typeof value === "string") {
      return toUtcIso(fromUtcIso(value));
    }
  } catch (error) {
    if (!(error instanceof TimeParseError)) {
      throw error;
    }
  }
  getLogger("time").warn({ value }, "Discarding unparseable timestamp");
  return null;
}

/**
 * Parse user-entered date/time text.
 *
 * Zoned ISO input is converted directly. Naive input
 * (`YYYY-MM-DD[ HH:MM[:SS]]`, `DD.MM.YYYY[ HH:MM[:SS]]`, `DD/MM/YYYY`)
 * is read as wall-clock time in `timeZone`. Returns `null` when the
 * text matches none of these.
 */
export function parseDateTime(text: string, timeZone: string): string | null {
  const trimmed = text.trim();
  if (trimmed === "") {
    return null;
  }

  const iso = matchIso(trimmed);
  if (iso !== null) {
    if (iso.zone === undefined) {
      return toUtcIso(new Date(localToUtcMs(iso.fields, timeZone)));
    }
    const offset = parseOffsetMinutes(iso.zone);
    if (offset === null) {
      return null;
    }
    return toUtcIso(
      new Date(fieldsToUtcMs(iso.fields) - offset * MS_PER_MINUTE),
    );
  }

  const dayFirst = DAY_FIRST_PATTERN.exec(trimmed);
  if (dayFirst !== null) {
    const fields: DateTimeFields = {
      year: Number(dayFirst[3]),
      month: Number(dayFirst[2]),
      day: Number(dayFirst[1]),
      hour: Number(dayFirst[4] ?? "0"),
      minute: Number(dayFirst[5] ?? "0"),
      second: Number(dayFirst[6] ?? "0"),
    };
    if (isValidFields(fields)) {
      return toUtcIso(new Date(localToUtcMs(fields, timeZone)));
    }
  }

  return null;
}

/**
 * Validate a `YYYY-MM-DD` calendar date. Returns the input or `null`.
 */
export function parseDate(text: string | null | undefined): string | null {
  if (text === null || text === undefined) {
    return null;
  }
  const trimmed = text.trim();
  const match = DATE_PATTERN.exec(trimmed);
  if (match === null) {
    return null;
  }
  const valid = isValidFields({
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: 0,
    minute: 0,
    second: 0,
  });
  return valid ? trimmed : null;
}

/**
 * UTC bounds of a calendar day, inclusive to the second.
 */
export function dayBounds(date: string): DayBounds {
  const valid = parseDate(date);
  if (valid === null) {
    throw new TimeParseError(`Invalid date: ${date}`, date);
  }
  return { start: `${valid}T00:00:00Z`, end: `${valid}T23:59:59Z` };
}

/**
 * Today's calendar date in `timeZone`.
 */
export function todayIso(timeZone: string, now: Date = new Date()): string {
  const fields = zonedFields(now.getTime(), timeZone);
  return `${pad(fields.year, 4)}-${pad(fields.month)}-${pad(fields.day)}`;
}

/**
 * Render a stored timestamp in `timeZone`. Values that do not parse
 * are returned unchanged.
 */
export function formatTimestamp(
  value: string | Date | null,
  style: TimestampStyle,
  timeZone: string,
): string {
  if (value === null) {
    return "";
  }
  let utcMs: number;
  try {
    utcMs =
      value instanceof Date ? value.getTime() : fromUtcIso(value).getTime();
  } catch (error) {
    if (error instanceof TimeParseError) {
      return String(value);
    }
    throw error;
  }
  if (Number.isNaN(utcMs)) {
    return String(value);
  }

  const f = zonedFields(utcMs, timeZone);
  switch (style) {
    case "datetime":
      return `${pad(f.year, 4)}-${pad(f.month)}-${pad(f.day)} ${pad(f.hour)}:${pad(f.minute)}`;
    case "date":
      return `${pad(f.year, 4)}-${pad(f.month)}-${pad(f.day)}`;
    case "long_date":
      return `${String(f.day)} ${MONTH_NAMES[f.month - 1] ?? ""} ${String(f.year)}`;
    case "time":
      return `${pad(f.hour)}:${pad(f.minute)}`;
  }
}

/**
 * Render a `YYYY-MM-DD` calendar date. Invalid input is returned
 * unchanged.
 */
export function formatDate(value: string | null, style: DateStyle): string {
  if (value === null) {
    return "";
  }
  const valid = parseDate(value);
  if (valid === null) {
    return value;
  }
  const [year, month, day] = valid.split("-");
  switch (style) {
    case "long_date":
      return `${String(Number(day))} ${MONTH_NAMES[Number(month) - 1] ?? ""} ${year ?? ""}`;
    case "short_date":
      return `${day ?? ""}.${month ?? ""}.${year ?? ""}`;
  }
}
