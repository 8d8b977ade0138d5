// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { createHash } from "node:crypto";
import { createRequire } from "node:module";

import { getLogger } from "../logging.js";

const require = createRequire(import.meta.url);
const CYRILLIC_TO_LATIN: unknown = require("./transliteration.json");

/**
 * Thrown when every collision-suffixed slug candidate is taken.
 */
export class SlugGenerationError extends Error {
  constructor(base: string, attempts: number) {
    super(
      `Could not generate a unique slug for "${base}" after ${String(attempts)} attempts`,
    );
    this.name = "SlugGenerationError";
  }
}

function loadTable(value: unknown): ReadonlyMap<string, string> {
  const table = new Map<string, string>();
  if (typeof value === "object" && value !== null) {
    for (const [from, to] of Object.entries(value)) {
      if (typeof to === "string") {
        table.set(from, to);
      }
    }
  }
  return table;
}

const table = loadTable(CYRILLIC_TO_LATIN);

function shortHash(text: string): string {
  return createHash("sha1").update(text, "utf8").digest("hex").slice(0, 6);
}

/**
 * Lower-case and transliterate Cyrillic letters to Latin.
 */
export function transliterate(text: string): string {
  let result = "";
  for (const char of text.toLowerCase()) {
    result += table.get(char) ?? char;
  }
  return result;
}

/**
 * Derive a URL-safe slug from a chat name: the first `maxWords` words,
 * transliterated and stripped to `[a-z0-9]`, joined with `_`.
 *
 * Names that leave nothing behind fall back to `chat_<hash>`.
 */
export function slugify(name: string, maxWords = 3): string {
  const normalized = transliterate(name.normalize("NFKD")).replace(
    /[^a-z0-9 ]/g,
    "",
  );
  const slug = normalized
    .split(/\s+/)
    .filter((word) => word !== "")
    .slice(0, maxWords)
    .join("_");
  if (slug !== "") {
    return slug;
  }
  const fallback = `chat_${shortHash(name)}`;
  getLogger("slug").warn({ name, slug: fallback }, "Generated hash slug");
  return fallback;
}

/**
 * Return `base` when it is free, otherwise the first free
 * `base_<hash(seed + i)>` candidate.
 *
 * The check races with concurrent inserts; the unique constraint on
 * `chats.slug` still rejects a loser.
 */
export async function resolveUniqueSlug(
  base: string,
  seed: string,
  exists: (slug: string) => Promise<boolean>,
  maxTries = 10,
): Promise<string> {
  if (!(await exists(base))) {
    return base;
  }
  for (let attempt = 0; attempt < maxTries; attempt++) {
    const candidate = `${base}_${shortHash(`${seed}${String(attempt)}`)}`;
    if (!(await exists(candidate))) {
      getLogger("slug").info(
        { base, slug: candidate },
        "Resolved slug collision",
      );
      return candidate;
    }
  }
  throw new SlugGenerationError(base, maxTries);
}
