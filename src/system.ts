/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { AdminOperations } from './admin-operations.js';
import { SqliteAuditLog } from './audit/sqlite-audit-log.js';
import { AccessDecisionCache } from './blocklist/access-decision-cache.js';
import * as config from './config.js';
import { GatewayDispatcher } from './gateway-dispatcher.js';
import {
  JurisdictionRegistry,
  createDefaultProfiles,
} from './jurisdictions/index.js';
import { errorMessage } from './lib/error.js';
import log from './log.js';
import * as metrics from './metrics.js';
import { UpstreamProxyStreamer } from './proxy/upstream-proxy-streamer.js';
import { FsDenylistSnapshotStore } from './store/fs-denylist-snapshot-store.js';
import { OverrideListStore } from './store/override-list-store.js';
import { DenylistSyncWorker } from './workers/denylist-sync-worker.js';

// Shutdown registry for managing cleanup handlers
type CleanupHandler = {
  name: string;
  handler: () => Promise<void>;
};

const cleanupHandlers: CleanupHandler[] = [];

/**
 * Register a cleanup handler to be called during shutdown. Handlers run in
 * registration order.
 */
export function registerCleanupHandler(
  name: string,
  handler: () => Promise<void>,
): void {
  cleanupHandlers.push({ name, handler });
  log.debug(`Registered cleanup handler: ${name}`);
}

process.on('uncaughtException', (error) => {
  metrics.uncaughtExceptionCounter.inc();
  log.error('Uncaught exception:', error);
});

export const auditLog = new SqliteAuditLog({
  log,
  dbPath: config.AUDIT_DB_PATH,
});

export const overrideList = new OverrideListStore({
  log,
  filePath: config.OVERRIDE_LIST_FILE,
});

export const denylistSnapshotStore = new FsDenylistSnapshotStore({
  log,
  filePath: config.DENYLIST_SNAPSHOT_FILE,
});

export const accessDecisionCache = new AccessDecisionCache({
  log,
  overrideSource: overrideList,
  snapshotSource: denylistSnapshotStore,
  windowMs: config.BLOCKLIST_CACHE_WINDOW_SECONDS * 1000,
});

export const denylistSyncWorker = new DenylistSyncWorker({
  log,
  snapshotStore: denylistSnapshotStore,
  auditSink: auditLog,
  denylistUrl: config.DENYLIST_URL,
  fetchTimeoutMs: config.DENYLIST_FETCH_TIMEOUT_MS,
  intervalMs: config.DENYLIST_SYNC_INTERVAL_SECONDS * 1000,
  maxAgeMs: config.DENYLIST_MAX_AGE_SECONDS * 1000,
  onSynced: () => {
    accessDecisionCache.reload();
  },
});

export const jurisdictions = new JurisdictionRegistry({
  log,
  profiles: createDefaultProfiles(),
  defaultCountry: config.DEFAULT_JURISDICTION,
});

export const upstreamStreamer = new UpstreamProxyStreamer({
  log,
  upstreamUrl: config.UPSTREAM_GATEWAY_URL,
  timeoutMs: config.UPSTREAM_TIMEOUT_MS,
  ipnsMaxAgeSeconds: config.IPNS_CACHE_MAX_AGE_SECONDS,
});

export const gatewayDispatcher = new GatewayDispatcher({
  log,
  blocklist: accessDecisionCache,
  streamer: upstreamStreamer,
  jurisdictions,
  auditSink: auditLog,
});

export const adminOperations = new AdminOperations({
  log,
  cache: accessDecisionCache,
  syncWorker: denylistSyncWorker,
  jurisdictions,
  auditSink: auditLog,
  auditReader: auditLog,
});

let isShuttingDown = false;

export const shutdown = async (exitCode = 0) => {
  if (isShuttingDown) {
    log.info('Shutdown already in progress');
  } else {
    isShuttingDown = true;
    log.info('Shutting down...');

    // Registered handlers first (e.g., the HTTP server)
    for (const { name, handler } of cleanupHandlers) {
      try {
        log.debug(`Running cleanup handler: ${name}`);
        await handler();
        log.debug(`Cleanup handler completed: ${name}`);
      } catch (error) {
        log.error(`Error in cleanup handler: ${name}`, {
          error: errorMessage(error),
        });
      }
    }

    denylistSyncWorker.stop();
    await auditLog.close();

    log.info('Shutdown complete');
    process.exit(exitCode);
  }
};

// Handle shutdown signals
process.on('SIGINT', async () => {
  await shutdown();
});

process.on('SIGTERM', async () => {
  await shutdown();
});
