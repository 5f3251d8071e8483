/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { AxiosError } from 'axios';
import type { InternalAxiosRequestConfig } from 'axios';
import { strict as assert } from 'node:assert';
import { afterEach, beforeEach, describe, it, mock } from 'node:test';

import { stubAxiosCreate, stubResponse } from '../../test/axios-stub.js';
import { createTestLogger } from '../../test/test-logger.js';
import { DenylistSyncError } from '../lib/error.js';
import {
  AuditEvent,
  AuditSink,
  DenylistSnapshot,
  DenylistSnapshotSource,
} from '../types.js';
import { DenylistSyncWorker } from './denylist-sync-worker.js';

const log = createTestLogger({ suite: 'DenylistSyncWorker' });

const DENYLIST_URL = 'https://denylist.test/denylist.conf';
const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = Date.parse('2026-03-04T05:06:07.000Z');

const DENYLIST_BODY = [
  '# published denylist',
  'location ~ "^/ipfs/QmTestCid1" { return 410; }',
  'location ~ "^/ipfs/bafybeitestcid2/index.html" { return 410; }',
  'location ~ "^/ipfs/QmTestCid1" { return 410; }',
  'location ~ "^/ipfs/not-a-cid" { return 410; }',
].join('\n');

class MemorySnapshotStore implements DenylistSnapshotSource {
  snapshot: DenylistSnapshot | undefined;
  modified: Date | undefined;
  failWrites = false;

  read(): DenylistSnapshot | undefined {
    return this.snapshot;
  }

  async replace(snapshot: DenylistSnapshot): Promise<void> {
    if (this.failWrites) {
      throw new Error('disk full');
    }
    this.snapshot = snapshot;
    this.modified = new Date(NOW);
  }

  lastModified(): Date | undefined {
    return this.modified;
  }
}

class RecordingAuditSink implements AuditSink {
  events: AuditEvent[] = [];
  record(event: AuditEvent): void {
    this.events.push(event);
  }
}

describe('DenylistSyncWorker', () => {
  let store: MemorySnapshotStore;
  let audit: RecordingAuditSink;
  let requests: InternalAxiosRequestConfig[];
  let worker: DenylistSyncWorker | undefined;

  const respondWith = (status: number, data: unknown) =>
    stubAxiosCreate(async (config) => {
      requests.push(config);
      return stubResponse(config, { status, data });
    });

  const createWorker = (onSynced?: (count: number) => void) => {
    worker = new DenylistSyncWorker({
      log,
      snapshotStore: store,
      auditSink: audit,
      denylistUrl: DENYLIST_URL,
      now: () => NOW,
      onSynced,
    });
    return worker;
  };

  beforeEach(() => {
    store = new MemorySnapshotStore();
    audit = new RecordingAuditSink();
    requests = [];
  });

  afterEach(() => {
    worker?.stop();
    worker = undefined;
    mock.restoreAll();
  });

  describe('sync', () => {
    it('should replace the snapshot with the parsed entries', async () => {
      respondWith(200, DENYLIST_BODY);

      const count = await createWorker().sync();

      assert.equal(count, 2);
      assert.equal(requests[0]?.url, DENYLIST_URL);
      assert.deepEqual(store.snapshot, {
        source: DENYLIST_URL,
        fetchedAt: new Date(NOW),
        entries: [
          { cid: 'QmTestCid1', reason: 'ipfs-official-denylist' },
          { cid: 'bafybeitestcid2', reason: 'ipfs-official-denylist' },
        ],
      });
    });

    it('should write an empty snapshot when the denylist has no entries', async () => {
      store.snapshot = {
        source: DENYLIST_URL,
        fetchedAt: new Date(0),
        entries: [{ cid: 'QmOld1', reason: 'ipfs-official-denylist' }],
      };
      respondWith(200, '# nothing blocked today\n');

      assert.equal(await createWorker().sync(), 0);
      assert.deepEqual(store.snapshot?.entries, []);
    });

    it('should reject non-2xx responses with the status attached', async () => {
      respondWith(503, 'unavailable');

      await assert.rejects(createWorker().sync(), (error: unknown) => {
        assert.ok(error instanceof DenylistSyncError);
        assert.equal(error.status, 503);
        assert.equal(error.source, DENYLIST_URL);
        return true;
      });
      assert.equal(store.snapshot, undefined);
    });

    it('should wrap network errors', async () => {
      stubAxiosCreate(async (config) => {
        throw new AxiosError('getaddrinfo ENOTFOUND', 'ENOTFOUND', config);
      });

      await assert.rejects(createWorker().sync(), {
        name: 'DenylistSyncError',
        message: 'Network error downloading denylist: getaddrinfo ENOTFOUND',
      });
    });

    it('should reject bodies that are not text', async () => {
      respondWith(200, { entries: [] });

      await assert.rejects(createWorker().sync(), {
        name: 'DenylistSyncError',
        message: 'Denylist response was not text',
      });
    });

    it('should share one request between concurrent callers', async () => {
      respondWith(200, DENYLIST_BODY);
      const syncWorker = createWorker();

      const [first, second] = await Promise.all([
        syncWorker.sync(),
        syncWorker.sync(),
      ]);

      assert.equal(first, 2);
      assert.equal(second, 2);
      assert.equal(requests.length, 1);
    });
  });

  describe('runSync', () => {
    it('should audit a successful sync and notify the listener', async () => {
      respondWith(200, DENYLIST_BODY);
      const synced: number[] = [];

      const count = await createWorker((n) => synced.push(n)).runSync();

      assert.equal(count, 2);
      assert.deepEqual(synced, [2]);
      assert.deepEqual(audit.events, [
        { eventType: 'DENYLIST_SYNC', details: 'Downloaded 2 CIDs' },
      ]);
    });

    it('should keep the previous snapshot and audit the failure', async () => {
      const previous: DenylistSnapshot = {
        source: DENYLIST_URL,
        fetchedAt: new Date(0),
        entries: [{ cid: 'QmOld1', reason: 'ipfs-official-denylist' }],
      };
      store.snapshot = previous;
      respondWith(500, 'oops');
      const synced: number[] = [];

      const count = await createWorker((n) => synced.push(n)).runSync();

      assert.equal(count, undefined);
      assert.equal(store.snapshot, previous);
      assert.deepEqual(synced, []);
      assert.deepEqual(audit.events, [
        {
          eventType: 'DENYLIST_SYNC_FAILED',
          details: 'Denylist request failed with HTTP 500',
        },
      ]);
    });

    it('should report snapshot write failures', async () => {
      store.failWrites = true;
      respondWith(200, DENYLIST_BODY);

      assert.equal(await createWorker().runSync(), undefined);
      assert.equal(
        audit.events[0]?.details,
        'Unable to write denylist snapshot: disk full',
      );
    });
  });

  describe('start', () => {
    it('should sync immediately when there is no snapshot', async () => {
      respondWith(200, DENYLIST_BODY);

      await createWorker().start();

      assert.equal(requests.length, 1);
      assert.equal(store.snapshot?.entries.length, 2);
    });

    it('should skip the startup sync when the snapshot is fresh', async () => {
      store.modified = new Date(NOW - DAY_MS + 1000);
      respondWith(200, DENYLIST_BODY);

      await createWorker().start();

      assert.equal(requests.length, 0);
    });

    it('should sync at startup when the snapshot is older than a day', async () => {
      store.modified = new Date(NOW - DAY_MS - 1000);
      respondWith(200, DENYLIST_BODY);

      const syncWorker = createWorker();
      assert.equal(syncWorker.isSnapshotStale(), true);
      await syncWorker.start();

      assert.equal(requests.length, 1);
    });

    it('should keep re-syncing on schedule after a failed attempt', async () => {
      const previous: DenylistSnapshot = {
        source: DENYLIST_URL,
        fetchedAt: new Date(0),
        entries: [{ cid: 'QmOld1', reason: 'ipfs-official-denylist' }],
      };
      store.snapshot = previous;
      store.modified = new Date(NOW);
      const statuses = [500, 200];
      stubAxiosCreate(async (config) => {
        requests.push(config);
        return stubResponse(config, {
          status: statuses.shift() ?? 200,
          data: DENYLIST_BODY,
        });
      });
      // let the queued request and its handlers finish
      const settle = async () => {
        for (let i = 0; i < 5; i++) {
          await new Promise((resolve) => setImmediate(resolve));
        }
      };

      mock.timers.enable({ apis: ['setInterval'] });
      try {
        const syncWorker = createWorker();
        await syncWorker.start();
        assert.equal(requests.length, 0);

        mock.timers.tick(DAY_MS);
        await settle();
        assert.equal(requests.length, 1);
        assert.equal(store.snapshot, previous);

        mock.timers.tick(DAY_MS - 1);
        await settle();
        assert.equal(requests.length, 1);

        mock.timers.tick(1);
        await settle();
        assert.equal(requests.length, 2);
        assert.deepEqual(
          store.snapshot?.entries.map((entry) => entry.cid),
          ['QmTestCid1', 'bafybeitestcid2'],
        );
        assert.deepEqual(
          audit.events.map((event) => event.eventType),
          ['DENYLIST_SYNC_FAILED', 'DENYLIST_SYNC'],
        );

        syncWorker.stop();
      } finally {
        mock.timers.reset();
      }
    });
  });
});
