// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import {
  ChatNotFoundError,
  errorMessage,
  MessageNotFoundError,
  ValidationError,
} from "@chatvault/core";

export function writeJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + "\n");
}

export function writeLine(line = ""): void {
  process.stdout.write(`${line}\n`);
}

/**
 * Print a failure to stderr and mark the process as failed. Validation
 * failures print one line per field.
 */
export function reportError(error: unknown): void {
  if (error instanceof ValidationError) {
    for (const [field, message] of Object.entries(error.errors)) {
      process.stderr.write(`${field}: ${message}\n`);
    }
  } else if (
    error instanceof ChatNotFoundError ||
    error instanceof MessageNotFoundError
  ) {
    process.stderr.write(`${error.message}.\n`);
  } else {
    process.stderr.write(`${errorMessage(error)}\n`);
  }
  process.exitCode = 1;
}

export function yesNo(value: boolean): string {
  return value ? "yes" : "no";
}
