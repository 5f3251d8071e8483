/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import fse from 'fs-extra';
import * as winston from 'winston';

import { DENYLIST_REASON } from '../constants.js';
import { parseSnapshotText, serializeSnapshot } from '../lib/blocklist-file.js';
import { DenylistSnapshot, DenylistSnapshotSource } from '../types.js';
import { isFileNotFound } from './override-list-store.js';

interface LoadedSnapshot {
  version: string;
  snapshot: DenylistSnapshot;
}

/**
 * File-backed denylist snapshot. Reads are memoized on the file's mtime and
 * size so the cache can ask for the snapshot on every lookup; writes go to a
 * temporary file that is then moved over the snapshot path, so readers only
 * ever see a complete file.
 */
export class FsDenylistSnapshotStore implements DenylistSnapshotSource {
  private log: winston.Logger;
  private filePath: string;
  private tmpDir: string;
  private loaded: LoadedSnapshot | undefined;

  constructor({
    log,
    filePath,
    tmpDir = path.join(path.dirname(filePath), 'tmp'),
  }: {
    log: winston.Logger;
    filePath: string;
    tmpDir?: string;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.filePath = filePath;
    this.tmpDir = tmpDir;
  }

  private statVersion(): string | undefined {
    try {
      const stats = fs.statSync(this.filePath);
      return `${stats.mtimeMs}:${stats.size}`;
    } catch (error) {
      if (!isFileNotFound(error)) {
        this.log.error('Unable to stat denylist snapshot', {
          filePath: this.filePath,
          error,
        });
      }
      return undefined;
    }
  }

  read(): DenylistSnapshot | undefined {
    const version = this.statVersion();
    if (version === undefined) {
      this.loaded = undefined;
      return undefined;
    }
    if (this.loaded?.version === version) {
      return this.loaded.snapshot;
    }

    try {
      const text = fs.readFileSync(this.filePath, 'utf8');
      const snapshot = parseSnapshotText(text, DENYLIST_REASON);
      this.loaded = { version, snapshot };
      this.log.debug('Loaded denylist snapshot', {
        filePath: this.filePath,
        entries: snapshot.entries.length,
      });
      return snapshot;
    } catch (error) {
      if (!isFileNotFound(error)) {
        this.log.error('Unable to read denylist snapshot', {
          filePath: this.filePath,
          error,
        });
      }
      // keep serving the last complete snapshot we parsed, if any
      return this.loaded?.snapshot;
    }
  }

  async replace(snapshot: DenylistSnapshot): Promise<void> {
    await fs.promises.mkdir(this.tmpDir, { recursive: true });
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });

    const tmpPath = path.join(
      this.tmpDir,
      `${path.basename(this.filePath)}.${crypto.randomBytes(6).toString('hex')}`,
    );

    try {
      await fs.promises.writeFile(tmpPath, serializeSnapshot(snapshot), 'utf8');
      await fse.move(tmpPath, this.filePath, { overwrite: true });
    } catch (error) {
      await fs.promises.rm(tmpPath, { force: true });
      throw error;
    }

    const version = this.statVersion();
    if (version !== undefined) {
      this.loaded = { version, snapshot };
    }

    this.log.info('Replaced denylist snapshot', {
      filePath: this.filePath,
      entries: snapshot.entries.length,
    });
  }

  lastModified(): Date | undefined {
    try {
      return fs.statSync(this.filePath).mtime;
    } catch (error) {
      if (!isFileNotFound(error)) {
        this.log.error('Unable to stat denylist snapshot', {
          filePath: this.filePath,
          error,
        });
      }
      return undefined;
    }
  }
}
