/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  NextFunction,
  Request,
  Response,
  Router,
  default as express,
} from 'express';
import { default as asyncHandler } from 'express-async-handler';

import { AdminOperations } from '../admin-operations.js';

const MAX_AUDIT_LIMIT = 1000;

export function createAdminRouter({
  adminOperations,
  adminApiKey,
}: {
  adminOperations: AdminOperations;
  adminApiKey: string;
}): Router {
  const router = Router();

  // Only allow access to admin routes if the bearer token matches the admin api key
  router.use('/admin', (req: Request, res: Response, next: NextFunction) => {
    if (req.headers.authorization === `Bearer ${adminApiKey}`) {
      next();
    } else {
      res.status(401).json({ error: 'Unauthorized' });
    }
  });

  router.post('/admin/blocklist/reload', (_req: Request, res: Response) => {
    res.json({ success: true, ...adminOperations.reloadBlocklist() });
  });

  router.post(
    '/admin/denylist/sync',
    asyncHandler(async (_req: Request, res: Response) => {
      const result = await adminOperations.syncDenylist();
      res.status(result.success ? 200 : 502).json(result);
    }),
  );

  router.get('/admin/blocklist/stats', (_req: Request, res: Response) => {
    res.json(adminOperations.getBlocklistStats());
  });

  router.get('/admin/blocklist/test/:cid', (req: Request, res: Response) => {
    res.json(adminOperations.testCid(req.params.cid));
  });

  router.get('/admin/jurisdictions', (_req: Request, res: Response) => {
    res.json(adminOperations.listJurisdictions());
  });

  router.put(
    '/admin/jurisdiction',
    express.json(),
    (req: Request, res: Response) => {
      const countryCode: unknown = req.body?.countryCode;
      if (typeof countryCode !== 'string' || countryCode.trim() === '') {
        res
          .status(400)
          .json({ error: "'countryCode' must be a non-empty string" });
        return;
      }

      const result = adminOperations.setJurisdiction(countryCode.trim());
      res.status(result.success ? 200 : 400).json(result);
    },
  );

  router.get('/admin/audit', (req: Request, res: Response) => {
    const { limit } = req.query;
    let parsed: number | undefined;
    if (limit !== undefined) {
      parsed = typeof limit === 'string' ? Number(limit) : NaN;
      if (
        !Number.isInteger(parsed) ||
        parsed < 1 ||
        parsed > MAX_AUDIT_LIMIT
      ) {
        res.status(400).json({
          error: `'limit' must be an integer from 1 to ${MAX_AUDIT_LIMIT}`,
        });
        return;
      }
    }
    res.json({ events: adminOperations.getRecentAuditEvents(parsed) });
  });

  return router;
}
