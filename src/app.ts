/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Server } from 'node:http';

import * as config from './config.js';
import * as events from './events.js';
import { createHttpApp } from './http-app.js';
import log from './log.js';
import { registry } from './metrics.js';
import { createAdminRouter } from './routes/admin.js';
import { createCopyrightRouter } from './routes/copyright.js';
import { createGatewayRouter } from './routes/gateway.js';
import { createHealthRouter } from './routes/health.js';
import * as system from './system.js';

if (config.ENABLE_DENYLIST_SYNC) {
  await system.denylistSyncWorker.start();
} else {
  log.info('Denylist sync disabled');
}

const app = createHttpApp({
  log,
  routers: [
    createHealthRouter({
      upstream: system.upstreamStreamer,
      auditLog: system.auditLog,
      blocklist: system.accessDecisionCache,
      jurisdictions: system.jurisdictions,
      metricsRegistry: registry,
    }),
    createAdminRouter({
      adminOperations: system.adminOperations,
      adminApiKey: config.ADMIN_API_KEY,
    }),
    createCopyrightRouter({
      log,
      jurisdictions: system.jurisdictions,
      auditSink: system.auditLog,
    }),
    createGatewayRouter({
      dispatcher: system.gatewayDispatcher,
      jurisdictions: system.jurisdictions,
    }),
  ],
});

const stats = system.accessDecisionCache.getStats();
system.auditLog.record({
  eventType: events.SERVICE_STARTUP,
  details: {
    jurisdiction: system.jurisdictions.getActive()?.countryCode ?? null,
    blocklistEntries: stats.total,
  },
});

const server: Server = app.listen(config.PORT, () => {
  log.info(`Listening on port ${config.PORT}`, {
    upstream: config.UPSTREAM_GATEWAY_URL,
    blocklistEntries: stats.total,
  });
});

system.registerCleanupHandler('http-server', () => {
  return new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
});

export { server };
