// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { getLogger } from "../logging.js";
import type { DatabaseAdapter, DialectName } from "./adapter.js";

const SQLITE_SCHEMA = `
CREATE TABLE IF NOT EXISTS chats (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  slug TEXT NOT NULL UNIQUE,
  chat_id INTEGER UNIQUE,
  name TEXT NOT NULL,
  link TEXT,
  type TEXT,
  image TEXT,
  joined TEXT,
  is_active INTEGER NOT NULL DEFAULT 0,
  is_member INTEGER NOT NULL DEFAULT 0,
  is_public INTEGER NOT NULL DEFAULT 0,
  notes TEXT
);

CREATE TABLE IF NOT EXISTS messages (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  chat_ref_id INTEGER NOT NULL REFERENCES chats (id) ON DELETE CASCADE,
  msg_id INTEGER,
  timestamp TEXT,
  link TEXT,
  text TEXT,
  media TEXT,
  screenshot TEXT,
  tags TEXT,
  notes TEXT
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_unique_msg_id
  ON messages (chat_ref_id, msg_id) WHERE msg_id IS NOT NULL;

CREATE INDEX IF NOT EXISTS idx_messages_chat_timestamp
  ON messages (chat_ref_id, timestamp);
`;

const POSTGRES_SCHEMA = `
CREATE TABLE IF NOT EXISTS chats (
  id SERIAL PRIMARY KEY,
  slug TEXT NOT NULL CONSTRAINT chats_slug_key UNIQUE,
  chat_id BIGINT CONSTRAINT chats_chat_id_key UNIQUE,
  name TEXT NOT NULL,
  link TEXT,
  type TEXT,
  image TEXT,
  joined DATE,
  is_active BOOLEAN NOT NULL DEFAULT FALSE,
  is_member BOOLEAN NOT NULL DEFAULT FALSE,
  is_public BOOLEAN NOT NULL DEFAULT FALSE,
  notes TEXT
);

CREATE TABLE IF NOT EXISTS messages (
  id SERIAL PRIMARY KEY,
  chat_ref_id INTEGER NOT NULL REFERENCES chats (id) ON DELETE CASCADE,
  msg_id BIGINT,
  timestamp TIMESTAMPTZ,
  link TEXT,
  text TEXT,
  media JSONB,
  screenshot TEXT,
  tags JSONB,
  notes TEXT
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_unique_msg_id
  ON messages (chat_ref_id, msg_id) WHERE msg_id IS NOT NULL;

CREATE INDEX IF NOT EXISTS idx_messages_chat_timestamp
  ON messages (chat_ref_id, timestamp);

CREATE INDEX IF NOT EXISTS idx_messages_tags
  ON messages USING GIN (tags);
`;

export function schemaFor(dialect: DialectName): string {
  return dialect === "sqlite" ? SQLITE_SCHEMA : POSTGRES_SCHEMA;
}

/**
 * Create tables and indexes when missing. Safe to run repeatedly.
 */
export async function initializeSchema(db: DatabaseAdapter): Promise<void> {
  await db.exec(schemaFor(db.dialect.name));
  getLogger("schema").info({ dialect: db.dialect.name }, "Schema ready");
}
