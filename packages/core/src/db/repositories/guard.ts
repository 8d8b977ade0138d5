// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { getLogger } from "../../logging.js";
import { errorMessage } from "../../utils/error-message.js";
import type { QueryExecutor, UniqueViolation } from "../adapter.js";
import { DatabaseError } from "../errors.js";

const log = getLogger("repository");

/**
 * Whether a unique violation involves `column`, by reported column or
 * by constraint name.
 */
export function violates(violation: UniqueViolation, column: string): boolean {
  return (
    violation.columns.some(
      (reported) => reported === column || reported.endsWith(`.${column}`),
    ) || (violation.constraint?.includes(column) ?? false)
  );
}

/**
 * Run a repository operation so that no driver error escapes: unique
 * violations go through `onUniqueViolation`, everything else becomes a
 * {@link DatabaseError} carrying the driver error as `cause`.
 */
export async function guard<T>(
  db: QueryExecutor,
  operation: string,
  work: () => Promise<T>,
  onUniqueViolation?: (violation: UniqueViolation) => DatabaseError | null,
): Promise<T> {
  try {
    return await work();
  } catch (error) {
    if (error instanceof DatabaseError) {
      throw error;
    }
    const violation = db.uniqueViolation(error);
    if (violation !== null) {
      log.debug({ operation, violation }, "Unique constraint violated");
      const mapped = onUniqueViolation?.(violation) ?? null;
      if (mapped !== null) {
        mapped.cause = error;
        throw mapped;
      }
    }
    log.error({ operation, err: error }, "Database operation failed");
    throw new DatabaseError(`Failed to ${operation}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
