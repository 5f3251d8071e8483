/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Request, Response, Router } from 'express';
import { default as asyncHandler } from 'express-async-handler';
import type { Registry } from 'prom-client';

import { JurisdictionRegistry } from '../jurisdictions/registry.js';
import { UpstreamHealth } from '../proxy/upstream-proxy-streamer.js';
import { BlocklistStats } from '../types.js';

export function createHealthRouter({
  upstream,
  auditLog,
  blocklist,
  jurisdictions,
  metricsRegistry,
}: {
  upstream: { checkHealth(): Promise<UpstreamHealth> };
  auditLog: { isHealthy(): boolean };
  blocklist: { getStats(): BlocklistStats };
  jurisdictions: JurisdictionRegistry;
  metricsRegistry: Registry;
}): Router {
  const router = Router();

  router.get(
    '/health',
    asyncHandler(async (_req: Request, res: Response) => {
      const upstreamHealth = await upstream.checkHealth();
      const auditHealthy = auditLog.isHealthy();
      const stats = blocklist.getStats();
      const healthy = upstreamHealth.reachable && auditHealthy;

      res.status(healthy ? 200 : 503).json({
        status: healthy ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        upstream: upstreamHealth,
        auditLog: { healthy: auditHealthy },
        blocklist: {
          total: stats.total,
          overrides: stats.overrides,
          denylist: stats.denylist,
        },
        jurisdiction: jurisdictions.getActive()?.countryCode ?? null,
      });
    }),
  );

  router.get(
    '/gateway/metrics',
    asyncHandler(async (_req: Request, res: Response) => {
      res.set('Content-Type', metricsRegistry.contentType);
      res.send(await metricsRegistry.metrics());
    }),
  );

  return router;
}
