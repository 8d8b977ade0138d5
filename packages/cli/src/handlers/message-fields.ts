// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import {
  formatTimestamp,
  type Message,
  type MessageInput,
  messageShortText,
} from "@chatvault/core";

import { writeLine } from "./output.js";

/** Message fields as commander parses them. */
export interface MessageFieldOptions {
  msgId?: string;
  timestamp?: string;
  link?: string;
  text?: string;
  /** Comma-separated or a JSON array. */
  media?: string;
  screenshot?: string;
  /** Comma-separated or a JSON array. */
  tags?: string;
  notes?: string;
}

export function messageInputFromOptions(
  options: MessageFieldOptions,
): MessageInput {
  return {
    msgId: options.msgId,
    timestamp: options.timestamp,
    link: options.link,
    text: options.text,
    media: options.media,
    screenshot: options.screenshot,
    tags: options.tags,
    notes: options.notes,
  };
}

export function messageLine(message: Message, timeZone: string): string {
  const when =
    message.timestamp === null
      ? "undated"
      : formatTimestamp(message.timestamp, "datetime", timeZone);
  return `#${String(message.id)}  ${when}  ${messageShortText(message)}`;
}

export function writeMessage(message: Message, timeZone: string): void {
  writeLine(`Message #${String(message.id)}`);
  if (message.msgId !== null) {
    writeLine(`Message ID: ${String(message.msgId)}`);
  }
  if (message.timestamp !== null) {
    writeLine(`Date: ${formatTimestamp(message.timestamp, "datetime", timeZone)}`);
  }
  if (message.link !== null) {
    writeLine(`Link: ${message.link}`);
  }
  if (message.tags.length > 0) {
    writeLine(`Tags: ${message.tags.join(", ")}`);
  }
  if (message.media.length > 0) {
    writeLine(`Media: ${message.media.join(", ")}`);
  }
  if (message.screenshot !== null) {
    writeLine(`Screenshot: ${message.screenshot}`);
  }
  if (message.notes !== null) {
    writeLine(`Notes: ${message.notes}`);
  }
  if (message.text !== null) {
    writeLine();
    writeLine(message.text);
  }
}
