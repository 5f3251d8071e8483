/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Response } from 'express';
import { randomUUID } from 'node:crypto';
import winston from 'winston';

import {
  UNAVAILABLE_FOR_LEGAL_REASONS,
  cacheControl,
  headerNames,
} from './constants.js';
import * as events from './events.js';
import { JurisdictionRegistry } from './jurisdictions/registry.js';
import { BlockedPageText } from './jurisdictions/types.js';
import { hasDotSegment, splitContentPath } from './lib/cid.js';
import * as metrics from './metrics.js';
import {
  AuditSink,
  BlocklistValidator,
  ContentNamespace,
  ContentStreamer,
} from './types.js';

export type AccessDecision =
  | { action: 'block'; cid: string; reason: string }
  | { action: 'allow'; cid: string };

export interface BlockedResponseBody extends BlockedPageText {
  error: string;
  status: number;
  cid: string;
  jurisdiction: string | null;
  reference: string;
}

const ACCESS_EVENTS: Record<ContentNamespace, string> = {
  ipfs: events.CID_ACCESS,
  ipns: events.IPNS_ACCESS,
};

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function extractCid(path: string): { cid: string; subPath: string } {
  return splitContentPath(path);
}

function renderBlockedPage(body: BlockedResponseBody, footerHtml: string) {
  const optional = (
    value: string | undefined,
    render: (escaped: string) => string,
  ) => (value === undefined ? '' : render(escapeHtml(value)));

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(body.title)}</title>
</head>
<body>
  <h1>${escapeHtml(body.title)}</h1>
  <p>${escapeHtml(body.message)}</p>
  <p><strong>${escapeHtml(body.reasonText)}</strong></p>
  <p>${escapeHtml(body.law)}</p>
${optional(body.action, (v) => `  <p>${v}</p>\n`)}${optional(
    body.link,
    (v) => `  <p><a href="${v}">${v}</a></p>\n`,
  )}${optional(body.note, (v) => `  <p><em>${v}</em></p>\n`)}  <p><small>Reference: ${escapeHtml(body.reference)}</small></p>
${footerHtml}
</body>
</html>
`;
}

/**
 * Decides whether a content request may be served and renders the result:
 * a 451 refusal, the upstream body, or an error status.
 */
export class GatewayDispatcher {
  private log: winston.Logger;
  private blocklist: BlocklistValidator;
  private streamer: ContentStreamer;
  private jurisdictions: JurisdictionRegistry;
  private auditSink: AuditSink;

  constructor({
    log,
    blocklist,
    streamer,
    jurisdictions,
    auditSink,
  }: {
    log: winston.Logger;
    blocklist: BlocklistValidator;
    streamer: ContentStreamer;
    jurisdictions: JurisdictionRegistry;
    auditSink: AuditSink;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.blocklist = blocklist;
    this.streamer = streamer;
    this.jurisdictions = jurisdictions;
    this.auditSink = auditSink;
  }

  decide(namespace: ContentNamespace, path: string): AccessDecision {
    const { cid } = extractCid(path);
    const reason = this.blocklist.isBlocked(cid);
    if (reason === undefined) {
      return { action: 'allow', cid };
    }
    this.log.debug('Blocklist match', { namespace, cid, reason });
    return { action: 'block', cid, reason };
  }

  async dispatch({
    namespace,
    path,
    res,
    signal,
    language,
    ipAddress,
  }: {
    namespace: ContentNamespace;
    path: string;
    res: Response;
    signal?: AbortSignal;
    language?: string;
    ipAddress?: string;
  }): Promise<void> {
    // the daemon's URL would resolve to a different CID than the one checked
    if (hasDotSegment(path)) {
      res.status(400).json({ error: 'Invalid path' });
      return;
    }

    const decision = this.decide(namespace, path);

    if (decision.cid === '') {
      res.status(400).json({ error: 'Missing CID' });
      return;
    }

    if (decision.action === 'block') {
      metrics.blocklistHitsCounter.inc({ namespace, reason: decision.reason });
      this.auditSink.record({
        eventType: events.BLOCKLIST_HIT,
        cid: decision.cid,
        ipAddress,
        details: { namespace, reason: decision.reason },
      });
      this.sendBlocked({
        res,
        cid: decision.cid,
        reason: decision.reason,
        language,
      });
      return;
    }

    this.auditSink.record({
      eventType: ACCESS_EVENTS[namespace],
      cid: decision.cid,
      ipAddress,
    });

    const outcome = await this.streamer.stream({
      namespace,
      path: path.replace(/^\/+/, ''),
      signal,
    });

    switch (outcome.kind) {
      case 'ok': {
        res.status(outcome.status);
        res.setHeader('Content-Type', outcome.contentType);
        res.setHeader('Cache-Control', outcome.cacheControl);
        res.setHeader(headerNames.upstreamStatus, String(outcome.status));
        outcome.stream.on('error', () => {
          // Headers are already out; truncate
          res.destroy();
        });
        outcome.stream.pipe(res);
        return;
      }
      case 'not-found':
        res.status(404).json({ error: 'Not Found' });
        return;
      case 'timeout':
        this.auditSink.record({
          eventType: events.UPSTREAM_TIMEOUT,
          cid: decision.cid,
          ipAddress,
          details: { namespace },
        });
        res.status(504).json({ error: 'Gateway Timeout' });
        return;
      case 'unreachable':
        this.auditSink.record({
          eventType: events.UPSTREAM_ERROR,
          cid: decision.cid,
          ipAddress,
          details: { namespace, message: outcome.message },
        });
        res.status(503).json({ error: 'Service Unavailable' });
        return;
      case 'cancelled':
        this.log.debug('Client went away before upstream answered', {
          namespace,
          cid: decision.cid,
        });
        if (!res.headersSent) {
          res.end();
        }
        return;
    }
  }

  private sendBlocked({
    res,
    cid,
    reason,
    language,
  }: {
    res: Response;
    cid: string;
    reason: string;
    language?: string;
  }): void {
    const active = this.jurisdictions.getActive();
    const reference = randomUUID().slice(0, 8);
    const body: BlockedResponseBody = {
      ...this.jurisdictions.getBlockedPageText(reason, language),
      error: 'Unavailable For Legal Reasons',
      status: UNAVAILABLE_FOR_LEGAL_REASONS,
      cid,
      jurisdiction: active?.countryCode ?? null,
      reference,
    };

    this.log.info('Refused blocked content', {
      cid,
      reason,
      jurisdiction: body.jurisdiction,
      reference,
    });

    res.status(UNAVAILABLE_FOR_LEGAL_REASONS);
    res.setHeader('Cache-Control', cacheControl.noStore);
    res.setHeader(headerNames.blockReason, reason);
    res.setHeader(
      headerNames.blockJurisdiction,
      active?.countryCode ?? 'none',
    );
    res.setHeader(headerNames.blockReference, reference);
    res.format({
      json: () => {
        res.json(body);
      },
      html: () => {
        res.send(renderBlockedPage(body, active?.getFooterHtml() ?? ''));
      },
      default: () => {
        res.json(body);
      },
    });
  }
}
