// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

export interface MostActiveChat {
  name: string;
  slug: string;
  messageCount: number;
}

export interface LatestMessage {
  id: number;
  timestamp: string | null;
  chatName: string;
  chatSlug: string;
}

export interface ArchiveStats {
  totalChats: number;
  totalMessages: number;
  /** Messages with at least one media reference. */
  mediaMessages: number;
  mostActiveChat: MostActiveChat | null;
  lastMessage: LatestMessage | null;
}
