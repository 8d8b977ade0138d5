// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

export { FormatError } from "./errors.js";

export {
  ArchiveFormatError,
  formatArchiveDocument,
  parseArchive,
  parseArchiveDocument,
  parseArchiveJson,
  parseArchiveYaml,
  serializeArchiveJson,
  serializeArchiveYaml,
  toArchiveDocument,
} from "./archive-format.js";
