/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Request, Response, Router, default as express } from 'express';
import { randomBytes } from 'node:crypto';
import winston from 'winston';

import * as events from '../events.js';
import { JurisdictionRegistry } from '../jurisdictions/registry.js';
import { JurisdictionProfile, NoticeFields } from '../jurisdictions/types.js';
import * as metrics from '../metrics.js';
import { AuditSink } from '../types.js';

const MARKDOWN_CONTENT_TYPE = 'text/markdown; charset=utf-8';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `NOTICE-<yyyyMMddHHmmss>-<hex>`, timestamp in UTC. */
export function noticeReference(date: Date, suffix: string): string {
  const stamp = date.toISOString().replace(/[-:T]/g, '').slice(0, 14);
  return `NOTICE-${stamp}-${suffix}`;
}

export function createCopyrightRouter({
  log,
  jurisdictions,
  auditSink,
  now = Date.now,
}: {
  log: winston.Logger;
  jurisdictions: JurisdictionRegistry;
  auditSink: AuditSink;
  now?: () => number;
}): Router {
  const router = Router();
  const routeLog = log.child({ router: 'copyright' });

  const withActiveProfile =
    (handler: (profile: JurisdictionProfile, res: Response) => void) =>
    (_req: Request, res: Response) => {
      const profile = jurisdictions.getActive();
      if (profile === undefined) {
        res.status(503).json({ error: 'No jurisdiction profile active' });
        return;
      }
      handler(profile, res);
    };

  router.post(
    '/copyright/report',
    express.json(),
    express.urlencoded({ extended: false }),
    (req: Request, res: Response) => {
      const fields: NoticeFields = isRecord(req.body) ? req.body : {};
      const cid =
        typeof fields.infringing_cid === 'string'
          ? fields.infringing_cid
          : undefined;
      const result = jurisdictions.validateNotice(fields);
      const profile = jurisdictions.getActive();
      const jurisdiction = profile?.countryCode ?? 'none';

      if (!result.valid) {
        metrics.noticesCounter.inc({ jurisdiction, status: 'rejected' });
        auditSink.record({
          eventType: events.NOTICE_REJECTED,
          cid,
          ipAddress: req.ip,
          details: {
            jurisdiction,
            message: result.message,
            field: result.field,
          },
        });
        res.status(400).json({
          error: result.message,
          ...(result.field === undefined ? {} : { field: result.field }),
        });
        return;
      }

      if (profile === undefined) {
        throw new Error('Notice accepted without an active jurisdiction');
      }

      const reference = noticeReference(
        new Date(now()),
        randomBytes(4).toString('hex'),
      );
      metrics.noticesCounter.inc({ jurisdiction, status: 'accepted' });
      auditSink.record({
        eventType: events.NOTICE_SUBMITTED,
        cid,
        ipAddress: req.ip,
        details: { jurisdiction, reference },
      });
      routeLog.info('Takedown notice received', {
        reference,
        jurisdiction,
        cid,
      });

      res.status(202).json({
        status: 'received',
        reference,
        jurisdiction,
        slaHours: profile.slaHours,
        message: profile.formatNoticeResponse(reference),
      });
    },
  );

  router.get(
    '/copyright/notice-template',
    withActiveProfile((profile, res) => {
      res.type(MARKDOWN_CONTENT_TYPE).send(profile.noticeTemplate);
    }),
  );

  router.get(
    '/copyright/counter-notice-template',
    withActiveProfile((profile, res) => {
      res.type(MARKDOWN_CONTENT_TYPE).send(profile.counterNoticeTemplate);
    }),
  );

  router.get(
    '/copyright/policy',
    withActiveProfile((profile, res) => {
      res.json({
        jurisdiction: profile.countryCode,
        lawName: profile.lawName,
        lawReference: profile.lawReference,
        slaHours: profile.slaHours,
        requiredFields: profile.requiredFields,
        languages: profile.languages,
        takedownReasons: profile.getTakedownReasons(),
        footerHtml: profile.getFooterHtml(),
      });
    }),
  );

  return router;
}
