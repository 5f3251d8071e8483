/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { createTestLogger } from '../../test/test-logger.js';
import { OverrideListStore, isFileNotFound } from './override-list-store.js';

const log = createTestLogger({ suite: 'OverrideListStore' });

describe('OverrideListStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'override-list-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should treat a missing file as an empty list', () => {
    const store = new OverrideListStore({
      log,
      filePath: path.join(dir, 'missing.txt'),
    });

    assert.deepEqual(store.load(), new Map());
  });

  it('should load entries with the default reason applied', () => {
    const filePath = path.join(dir, 'override.txt');
    fs.writeFileSync(filePath, '# operator list\nQmTestCid1 malware\nQmTestCid2\n');

    const store = new OverrideListStore({ log, filePath });

    assert.deepEqual(
      store.load(),
      new Map([
        ['QmTestCid1', 'malware'],
        ['QmTestCid2', 'policy_violation'],
      ]),
    );
  });

  it('should let a later line for the same CID win', () => {
    const filePath = path.join(dir, 'override.txt');
    fs.writeFileSync(filePath, 'QmTestCid1 malware\nQmTestCid1 dmca\n');

    const store = new OverrideListStore({ log, filePath });

    assert.equal(store.load()?.get('QmTestCid1'), 'dmca');
  });

  it('should report an unreadable file as undefined', () => {
    // a directory cannot be read as a file
    const store = new OverrideListStore({ log, filePath: dir });

    assert.equal(store.load(), undefined);
  });
});

describe('isFileNotFound', () => {
  it('should recognize ENOENT and ENOTDIR only', () => {
    const enoent = Object.assign(new Error('missing'), { code: 'ENOENT' });
    const enotdir = Object.assign(new Error('not dir'), { code: 'ENOTDIR' });
    const eacces = Object.assign(new Error('denied'), { code: 'EACCES' });

    assert.equal(isFileNotFound(enoent), true);
    assert.equal(isFileNotFound(enotdir), true);
    assert.equal(isFileNotFound(eacces), false);
    assert.equal(isFileNotFound('ENOENT'), false);
  });
});
