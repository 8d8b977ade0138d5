// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { readFile } from "node:fs/promises";
import { extname } from "node:path";

import { type ArchiveFormat, parseArchive } from "@chatvault/core";

import { type DatabaseOptions, openArchive } from "./database.js";
import { reportError, writeJson, writeLine } from "./output.js";

/** `.json` files are JSON; everything else is read as YAML. */
export function archiveFormatFor(path: string): ArchiveFormat {
  return extname(path).toLowerCase() === ".json" ? "json" : "yaml";
}

export async function handleArchiveImport(
  options: DatabaseOptions & {
    file?: string;
    format?: string;
    merge?: boolean;
    json?: boolean;
  },
): Promise<void> {
  if (options.file === undefined) {
    process.stderr.write("Missing required option --file.\n");
    process.exitCode = 1;
    return;
  }
  const format = options.format ?? archiveFormatFor(options.file);
  if (format !== "yaml" && format !== "json") {
    process.stderr.write(
      `Unsupported format "${format}". Use "yaml" or "json".\n`,
    );
    process.exitCode = 1;
    return;
  }

  try {
    const doc = parseArchive(await readFile(options.file, "utf-8"), format);
    const result = await openArchive(options, (ctx) =>
      ctx.archive.import(doc, { merge: options.merge ?? false }),
    );

    if (options.json) {
      writeJson(result);
      return;
    }
    writeLine(
      `${result.created ? "Created" : "Merged into"} chat ${result.chatSlug}: ` +
        `${String(result.imported)} imported, ${String(result.skipped)} skipped`,
    );
  } catch (error) {
    reportError(error);
  }
}
