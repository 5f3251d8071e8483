/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

interface DetailedErrorOptions {
  stack?: string;
  cause?: unknown;
  [key: string]: unknown;
}

export class DetailedError extends Error {
  [key: string]: unknown;

  constructor(message: string, options?: DetailedErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    Object.assign(this, options);
    this.stack = options?.stack ?? new Error().stack;
  }

  toJSON(): Record<string, unknown> {
    const { name: _name, message: _message, ...rest } = this;
    return {
      message: this.message,
      stack: this.stack,
      ...rest,
    };
  }
}

/**
 * Raised when the external denylist cannot be fetched or parsed. Never
 * reaches a client request; the sync worker logs it and keeps the previous
 * snapshot.
 */
export class DenylistSyncError extends DetailedError {
  declare readonly source: string;
  declare readonly status?: number;

  constructor(
    message: string,
    options: { source: string; status?: number; cause?: unknown },
  ) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
