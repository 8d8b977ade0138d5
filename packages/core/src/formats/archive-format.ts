// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";

import type {
  ArchiveChat,
  ArchiveDocument,
  ArchiveFormat,
  Chat,
  Message,
  MessageInput,
} from "../types/index.js";
import { errorMessage } from "../utils/error-message.js";
import { FormatError } from "./errors.js";

/** Current version of the archive document format. */
const CURRENT_VERSION = "1";

/**
 * Thrown when an archive document is malformed or fails structural
 * validation.
 */
export class ArchiveFormatError extends FormatError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ArchiveFormatError";
  }
}

const text = z.string().nullish();
const integerLike = z.union([z.number().int(), z.string()]).nullish();
const flag = z.union([z.boolean(), z.number(), z.string()]).nullish();
const list = z.union([z.array(z.string()), z.string()]).nullish();
const moment = z.union([z.string(), z.date()]).nullish();

const chatSchema = z.object({
  name: z.string().trim().min(1, "must not be empty"),
  slug: text,
  chatId: integerLike,
  link: text,
  type: text,
  image: text,
  joined: moment,
  isActive: flag,
  isMember: flag,
  isPublic: flag,
  notes: text,
});

const messageSchema = z.object({
  msgId: integerLike,
  timestamp: moment,
  link: text,
  text,
  media: list,
  screenshot: text,
  tags: list,
  notes: text,
});

const bodySchema = z.object({
  chat: chatSchema,
  messages: z.array(messageSchema).default([]),
});

// ---------------------------------------------------------------------------
// Parse
// ---------------------------------------------------------------------------

/**
 * Parse a YAML archive document.
 *
 * @throws {ArchiveFormatError} if the YAML is malformed or the document
 *   fails structural validation.
 */
export function parseArchiveYaml(yamlString: string): ArchiveDocument {
  let doc: unknown;
  try {
    doc = parseYaml(yamlString);
  } catch (error) {
    throw new ArchiveFormatError(`Invalid YAML: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return parseArchiveDocument(doc);
}

/**
 * Parse a JSON archive document.
 *
 * @throws {ArchiveFormatError} if the JSON is malformed or the document
 *   fails structural validation.
 */
export function parseArchiveJson(jsonString: string): ArchiveDocument {
  let doc: unknown;
  try {
    doc = JSON.parse(jsonString);
  } catch (error) {
    throw new ArchiveFormatError(`Invalid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return parseArchiveDocument(doc);
}

/**
 * Validate an already-decoded archive document.
 */
export function parseArchiveDocument(doc: unknown): ArchiveDocument {
  if (doc === null || typeof doc !== "object" || Array.isArray(doc)) {
    throw new ArchiveFormatError("Archive document must be an object");
  }
  if (!("version" in doc) || doc.version === undefined || doc.version === null) {
    throw new ArchiveFormatError("Missing required field: version");
  }
  if (String(doc.version) !== CURRENT_VERSION) {
    throw new ArchiveFormatError(
      `Unsupported version: ${String(doc.version)} (expected ${CURRENT_VERSION})`,
    );
  }

  const result = bodySchema.safeParse(doc);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ArchiveFormatError(
      `Invalid archive document: ${issues.join("; ")}`,
    );
  }
  return {
    version: CURRENT_VERSION,
    chat: result.data.chat,
    messages: result.data.messages,
  };
}

// ---------------------------------------------------------------------------
// Serialize
// ---------------------------------------------------------------------------

/**
 * Build the portable document for a chat and its messages. Null fields
 * and empty lists are left out.
 */
export function toArchiveDocument(
  chat: Chat,
  messages: readonly Message[],
): ArchiveDocument {
  const archiveChat: ArchiveChat = {
    name: chat.name,
    slug: chat.slug,
    ...(chat.chatId !== null && { chatId: chat.chatId }),
    ...(chat.link !== null && { link: chat.link }),
    ...(chat.type !== null && { type: chat.type }),
    ...(chat.image !== null && { image: chat.image }),
    ...(chat.joined !== null && { joined: chat.joined }),
    isActive: chat.isActive,
    isMember: chat.isMember,
    isPublic: chat.isPublic,
    ...(chat.notes !== null && { notes: chat.notes }),
  };

  return {
    version: CURRENT_VERSION,
    chat: archiveChat,
    messages: messages.map(
      (m): MessageInput => ({
        ...(m.msgId !== null && { msgId: m.msgId }),
        ...(m.timestamp !== null && { timestamp: m.timestamp }),
        ...(m.link !== null && { link: m.link }),
        ...(m.text !== null && { text: m.text }),
        ...(m.media.length > 0 && { media: m.media }),
        ...(m.screenshot !== null && { screenshot: m.screenshot }),
        ...(m.tags.length > 0 && { tags: m.tags }),
        ...(m.notes !== null && { notes: m.notes }),
      }),
    ),
  };
}

/**
 * Render an archive document as YAML or JSON text.
 */
export function formatArchiveDocument(
  doc: ArchiveDocument,
  format: ArchiveFormat,
): string {
  return format === "yaml"
    ? stringifyYaml(doc)
    : JSON.stringify(doc, null, 2) + "\n";
}

/**
 * Serialize a chat and its messages to a YAML string.
 */
export function serializeArchiveYaml(
  chat: Chat,
  messages: readonly Message[],
): string {
  return formatArchiveDocument(toArchiveDocument(chat, messages), "yaml");
}

/**
 * Serialize a chat and its messages to a JSON string.
 */
export function serializeArchiveJson(
  chat: Chat,
  messages: readonly Message[],
): string {
  return formatArchiveDocument(toArchiveDocument(chat, messages), "json");
}

/**
 * Parse archive text in the given format.
 */
export function parseArchive(
  source: string,
  format: ArchiveFormat,
): ArchiveDocument {
  return format === "yaml" ? parseArchiveYaml(source) : parseArchiveJson(source);
}
