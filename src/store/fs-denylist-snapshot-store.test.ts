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
import { DenylistSnapshot } from '../types.js';
import { FsDenylistSnapshotStore } from './fs-denylist-snapshot-store.js';

const log = createTestLogger({ suite: 'FsDenylistSnapshotStore' });

const snapshot = (cids: string[]): DenylistSnapshot => ({
  source: 'https://denylist.test/list.conf',
  fetchedAt: new Date('2026-01-02T03:04:05.000Z'),
  entries: cids.map((cid) => ({ cid, reason: 'ipfs-official-denylist' })),
});

describe('FsDenylistSnapshotStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'denylist-snapshot-'));
    filePath = path.join(dir, 'blocklist', 'denylist-snapshot.txt');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should report nothing before the first sync', () => {
    const store = new FsDenylistSnapshotStore({ log, filePath });

    assert.equal(store.read(), undefined);
    assert.equal(store.lastModified(), undefined);
  });

  it('should serve the replaced snapshot without re-reading the file', async () => {
    const store = new FsDenylistSnapshotStore({ log, filePath });
    const written = snapshot(['QmTestCid1', 'QmTestCid2']);

    await store.replace(written);

    assert.equal(store.read(), written);
    assert.ok(store.lastModified() instanceof Date);
  });

  it('should make the file readable by a fresh store', async () => {
    await new FsDenylistSnapshotStore({ log, filePath }).replace(
      snapshot(['QmTestCid1']),
    );

    const read = new FsDenylistSnapshotStore({ log, filePath }).read();

    assert.equal(read?.source, 'https://denylist.test/list.conf');
    assert.equal(read?.fetchedAt?.toISOString(), '2026-01-02T03:04:05.000Z');
    assert.deepEqual(read?.entries, [
      { cid: 'QmTestCid1', reason: 'ipfs-official-denylist' },
    ]);
  });

  it('should replace the previous snapshot wholesale', async () => {
    const store = new FsDenylistSnapshotStore({ log, filePath });
    await store.replace(snapshot(['QmTestCid1', 'QmTestCid2']));

    await store.replace(snapshot([]));

    assert.deepEqual(store.read()?.entries, []);
    assert.deepEqual(
      new FsDenylistSnapshotStore({ log, filePath }).read()?.entries,
      [],
    );
  });

  it('should leave no temporary files behind', async () => {
    const tmpDir = path.join(dir, 'tmp');
    const store = new FsDenylistSnapshotStore({ log, filePath, tmpDir });

    await store.replace(snapshot(['QmTestCid1']));

    assert.deepEqual(fs.readdirSync(tmpDir), []);
  });

  it('should pick up a snapshot written by another process', async () => {
    const store = new FsDenylistSnapshotStore({ log, filePath });
    assert.equal(store.read(), undefined);

    await new FsDenylistSnapshotStore({ log, filePath }).replace(
      snapshot(['QmTestCid3']),
    );

    assert.deepEqual(store.read()?.entries, [
      { cid: 'QmTestCid3', reason: 'ipfs-official-denylist' },
    ]);
  });
});
