// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

/**
 * Extract a human-readable message from an unknown caught value.
 *
 * Connection failures against a dual-stack host surface as an
 * `AggregateError` with an empty message; its inner errors are joined.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof AggregateError && error.message === "") {
    return error.errors.map(errorMessage).join("; ");
  }
  return error instanceof Error ? error.message : String(error);
}
