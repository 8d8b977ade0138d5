// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

/**
 * Base class for all database-related errors.
 */
export class DatabaseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DatabaseError";
  }
}

/**
 * Thrown when a chat insert or update collides with an existing slug.
 */
export class DuplicateSlugError extends DatabaseError {
  readonly slug: string;

  constructor(slug: string, options?: ErrorOptions) {
    super(`A chat with slug "${slug}" already exists`, options);
    this.name = "DuplicateSlugError";
    this.slug = slug;
  }
}

/**
 * Thrown when a chat insert or update collides with an existing
 * external chat identifier.
 */
export class DuplicateChatIdError extends DatabaseError {
  readonly chatId: number | null;

  constructor(chatId: number | null, options?: ErrorOptions) {
    super(`A chat with ID ${String(chatId)} already exists`, options);
    this.name = "DuplicateChatIdError";
    this.chatId = chatId;
  }
}

/**
 * Thrown when a message with the same external identifier already
 * exists in the chat.
 */
export class DuplicateMessageError extends DatabaseError {
  readonly chatRefId: number;
  readonly msgId: number | null;

  constructor(chatRefId: number, msgId: number | null, options?: ErrorOptions) {
    super(
      `Message ${String(msgId)} already exists in chat ${String(chatRefId)}`,
      options,
    );
    this.name = "DuplicateMessageError";
    this.chatRefId = chatRefId;
    this.msgId = msgId;
  }
}

/**
 * Thrown when a chat lookup, update or delete matches no row.
 */
export class ChatNotFoundError extends DatabaseError {
  constructor(identifier: number | string) {
    const detail =
      typeof identifier === "number"
        ? `id ${String(identifier)}`
        : `slug "${identifier}"`;
    super(`Chat not found for ${detail}`);
    this.name = "ChatNotFoundError";
  }
}

/**
 * Thrown when a message lookup, update or delete matches no row.
 */
export class MessageNotFoundError extends DatabaseError {
  constructor(messageId: number) {
    super(`Message not found for id ${String(messageId)}`);
    this.name = "MessageNotFoundError";
  }
}

/**
 * Thrown when an insert completes without yielding a generated id.
 */
export class MissingPrimaryKeyError extends DatabaseError {
  constructor(table: string) {
    super(`Insert into ${table} did not return a primary key`);
    this.name = "MissingPrimaryKeyError";
  }
}
