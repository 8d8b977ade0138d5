// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { writeFile } from "node:fs/promises";

import { formatArchiveDocument } from "@chatvault/core";

import { type DatabaseOptions, openArchive } from "./database.js";
import { reportError, writeLine } from "./output.js";

export async function handleArchiveExport(
  slug: string,
  options: DatabaseOptions & {
    format?: string;
    output?: string;
  },
): Promise<void> {
  const format = options.format ?? "yaml";
  if (format !== "yaml" && format !== "json") {
    process.stderr.write(
      `Unsupported format "${format}". Use "yaml" or "json".\n`,
    );
    process.exitCode = 1;
    return;
  }

  try {
    const doc = await openArchive(options, (ctx) => ctx.archive.export(slug));
    const text = formatArchiveDocument(doc, format);

    if (options.output) {
      await writeFile(options.output, text, "utf-8");
      writeLine(
        `Chat ${slug} exported to ${options.output} (${String(doc.messages.length)} messages)`,
      );
    } else {
      process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
    }
  } catch (error) {
    reportError(error);
  }
}
