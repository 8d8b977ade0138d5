// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

/**
 * Base class for all service-layer errors.
 */
export class ServiceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ServiceError";
  }
}

/**
 * Thrown when chat or message input fails validation, before any query
 * runs. `errors` maps each failing field to its message.
 */
export class ValidationError extends ServiceError {
  readonly errors: Readonly<Record<string, string>>;

  constructor(errors: Readonly<Record<string, string>>) {
    super(Object.values(errors).join(" "));
    this.name = "ValidationError";
    this.errors = errors;
  }
}
