/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as axios } from 'axios';
import type { AxiosInstance } from 'axios';
import * as winston from 'winston';

import { DENYLIST_REASON } from '../constants.js';
import * as events from '../events.js';
import { parseDenylist } from '../lib/denylist-parser.js';
import { DenylistSyncError, errorMessage } from '../lib/error.js';
import * as metrics from '../metrics.js';
import { AuditSink, DenylistSnapshotSource } from '../types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_FETCH_TIMEOUT_MS = 30 * 1000;

/**
 * Keeps the local denylist snapshot in step with the published denylist.
 * Syncs once at start when the snapshot is missing or older than `maxAgeMs`,
 * then every `intervalMs` regardless of how the previous attempt went.
 */
export class DenylistSyncWorker {
  private log: winston.Logger;
  private snapshotStore: DenylistSnapshotSource;
  private auditSink: AuditSink;
  private denylistUrl: string;
  private intervalMs: number;
  private maxAgeMs: number;
  private now: () => number;
  private onSynced?: (count: number) => void;
  private httpClient: AxiosInstance;
  private intervalId?: NodeJS.Timeout;
  private inFlight?: Promise<number>;

  constructor({
    log,
    snapshotStore,
    auditSink,
    denylistUrl,
    fetchTimeoutMs = DEFAULT_FETCH_TIMEOUT_MS,
    intervalMs = DAY_MS,
    maxAgeMs = DAY_MS,
    now = Date.now,
    onSynced,
  }: {
    log: winston.Logger;
    snapshotStore: DenylistSnapshotSource;
    auditSink: AuditSink;
    denylistUrl: string;
    fetchTimeoutMs?: number;
    intervalMs?: number;
    maxAgeMs?: number;
    now?: () => number;
    onSynced?: (count: number) => void;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.snapshotStore = snapshotStore;
    this.auditSink = auditSink;
    this.denylistUrl = denylistUrl;
    this.intervalMs = intervalMs;
    this.maxAgeMs = maxAgeMs;
    this.now = now;
    this.onSynced = onSynced;
    this.httpClient = axios.create({
      timeout: fetchTimeoutMs,
      responseType: 'text',
      // status handling is done here so non-2xx carries its code
      validateStatus: () => true,
    });
  }

  /**
   * Fetches the denylist and replaces the snapshot. Resolves to the number
   * of accepted entries. Calls made while a sync is running share it.
   */
  sync(): Promise<number> {
    if (this.inFlight === undefined) {
      this.inFlight = this.fetchAndReplace().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async fetchAndReplace(): Promise<number> {
    const source = this.denylistUrl;
    this.log.info('Downloading denylist', { source });

    let body: unknown;
    try {
      const response = await this.httpClient.get(source);
      if (response.status < 200 || response.status >= 300) {
        throw new DenylistSyncError(
          `Denylist request failed with HTTP ${response.status}`,
          { source, status: response.status },
        );
      }
      body = response.data;
    } catch (error) {
      if (error instanceof DenylistSyncError) {
        throw error;
      }
      throw new DenylistSyncError(
        `Network error downloading denylist: ${errorMessage(error)}`,
        { source, cause: error },
      );
    }

    if (typeof body !== 'string') {
      throw new DenylistSyncError('Denylist response was not text', {
        source,
      });
    }

    const entries = parseDenylist(body).map((cid) => ({
      cid,
      reason: DENYLIST_REASON,
    }));

    try {
      await this.snapshotStore.replace({
        source,
        fetchedAt: new Date(this.now()),
        entries,
      });
    } catch (error) {
      throw new DenylistSyncError(
        `Unable to write denylist snapshot: ${errorMessage(error)}`,
        { source, cause: error },
      );
    }

    return entries.length;
  }

  /**
   * Sync for the background schedule and admin callers that only need an
   * outcome: failures are logged and audited, never thrown.
   */
  async runSync(): Promise<number | undefined> {
    try {
      const count = await this.sync();
      metrics.denylistSyncCounter.inc({ status: 'success' });
      metrics.denylistEntriesGauge.set(count);
      metrics.denylistLastSyncTimestampSeconds.set(
        Math.floor(this.now() / 1000),
      );
      this.log.info('Denylist synchronized', { entries: count });
      this.auditSink.record({
        eventType: events.DENYLIST_SYNC,
        details: `Downloaded ${count} CIDs`,
      });
      this.onSynced?.(count);
      return count;
    } catch (error) {
      metrics.denylistSyncCounter.inc({ status: 'error' });
      this.log.error('Denylist sync failed, keeping previous snapshot', {
        error: errorMessage(error),
        status: error instanceof DenylistSyncError ? error.status : undefined,
      });
      this.auditSink.record({
        eventType: events.DENYLIST_SYNC_FAILED,
        details: errorMessage(error),
      });
      return undefined;
    }
  }

  isSnapshotStale(): boolean {
    const modified = this.snapshotStore.lastModified();
    if (modified === undefined) {
      return true;
    }
    return this.now() - modified.getTime() > this.maxAgeMs;
  }

  async start(): Promise<void> {
    if (this.intervalId !== undefined) {
      return;
    }

    this.intervalId = setInterval(() => {
      this.log.info('Scheduled denylist update');
      void this.runSync();
    }, this.intervalMs);

    this.log.info('Started denylist sync worker', {
      source: this.denylistUrl,
      intervalMs: this.intervalMs,
    });

    if (this.isSnapshotStale()) {
      this.log.info('Denylist snapshot missing or stale, downloading');
      await this.runSync();
    }
  }

  stop(): void {
    if (this.intervalId !== undefined) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
      this.log.info('Stopped denylist sync worker');
    }
  }
}
