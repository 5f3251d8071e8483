/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fs from 'node:fs';
import * as winston from 'winston';

import { DEFAULT_OVERRIDE_REASON } from '../constants.js';
import { parseBlocklistText } from '../lib/blocklist-file.js';
import { OverrideListSource } from '../types.js';

export function isFileNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Operator-maintained list of blocked CIDs. A later line for the same CID
 * replaces an earlier one.
 */
export class OverrideListStore implements OverrideListSource {
  private log: winston.Logger;
  private filePath: string;

  constructor({ log, filePath }: { log: winston.Logger; filePath: string }) {
    this.log = log.child({ class: this.constructor.name });
    this.filePath = filePath;
  }

  load(): Map<string, string> | undefined {
    let text: string;
    try {
      text = fs.readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (isFileNotFound(error)) {
        this.log.debug('Override list not found, treating as empty', {
          filePath: this.filePath,
        });
        return new Map();
      }
      this.log.error('Unable to read override list', {
        filePath: this.filePath,
        error,
      });
      return undefined;
    }

    const overrides = new Map<string, string>();
    for (const { cid, reason } of parseBlocklistText(
      text,
      DEFAULT_OVERRIDE_REASON,
    )) {
      overrides.set(cid, reason);
    }

    this.log.debug('Loaded override list', {
      filePath: this.filePath,
      entries: overrides.size,
    });
    return overrides;
  }
}
