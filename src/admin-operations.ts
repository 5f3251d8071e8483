/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { AccessDecisionCache } from './blocklist/access-decision-cache.js';
import * as events from './events.js';
import { JurisdictionRegistry } from './jurisdictions/registry.js';
import { JurisdictionSummary } from './jurisdictions/types.js';
import {
  AuditReader,
  AuditSink,
  BlocklistStats,
  StoredAuditEvent,
} from './types.js';
import { DenylistSyncWorker } from './workers/denylist-sync-worker.js';

const ADMIN_USER = 'admin';

export interface CidCheckResult {
  cid: string;
  blocked: boolean;
  reason: string | null;
}

export interface DenylistSyncResult {
  success: boolean;
  entries: number | null;
  total: number;
}

export type SetJurisdictionResult =
  | { success: true; active: JurisdictionSummary }
  | { success: false; error: string; available: string[] };

/** Operator actions behind the authenticated admin routes. */
export class AdminOperations {
  private log: winston.Logger;
  private cache: AccessDecisionCache;
  private syncWorker: DenylistSyncWorker;
  private jurisdictions: JurisdictionRegistry;
  private auditSink: AuditSink;
  private auditReader: AuditReader;

  constructor({
    log,
    cache,
    syncWorker,
    jurisdictions,
    auditSink,
    auditReader,
  }: {
    log: winston.Logger;
    cache: AccessDecisionCache;
    syncWorker: DenylistSyncWorker;
    jurisdictions: JurisdictionRegistry;
    auditSink: AuditSink;
    auditReader: AuditReader;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.cache = cache;
    this.syncWorker = syncWorker;
    this.jurisdictions = jurisdictions;
    this.auditSink = auditSink;
    this.auditReader = auditReader;
  }

  reloadBlocklist(): { total: number } {
    const total = this.cache.reload();
    this.auditSink.record({
      eventType: events.BLOCKLIST_RELOAD,
      userId: ADMIN_USER,
      details: { total },
    });
    return { total };
  }

  async syncDenylist(): Promise<DenylistSyncResult> {
    this.log.info('Denylist sync requested');
    const entries = await this.syncWorker.runSync();
    return {
      success: entries !== undefined,
      entries: entries ?? null,
      total: this.cache.getStats().total,
    };
  }

  setJurisdiction(countryCode: string): SetJurisdictionResult {
    const previous = this.jurisdictions.getActive()?.countryCode;
    if (!this.jurisdictions.setActive(countryCode)) {
      return {
        success: false,
        error: `Unknown jurisdiction: ${countryCode}`,
        available: this.jurisdictions.list().map((j) => j.countryCode),
      };
    }

    const active = this.jurisdictions.getActive();
    if (active === undefined) {
      throw new Error('Jurisdiction registry lost its active profile');
    }

    this.auditSink.record({
      eventType: events.JURISDICTION_CHANGE,
      userId: ADMIN_USER,
      details: { from: previous ?? null, to: active.countryCode },
    });

    return {
      success: true,
      active: {
        countryCode: active.countryCode,
        lawName: active.lawName,
        lawReference: active.lawReference,
        slaHours: active.slaHours,
      },
    };
  }

  listJurisdictions(): {
    active: string | null;
    available: JurisdictionSummary[];
  } {
    return {
      active: this.jurisdictions.getActive()?.countryCode ?? null,
      available: this.jurisdictions.list(),
    };
  }

  getBlocklistStats(): BlocklistStats {
    return this.cache.getStats();
  }

  testCid(cid: string): CidCheckResult {
    const reason = this.cache.isBlocked(cid);
    return { cid, blocked: reason !== undefined, reason: reason ?? null };
  }

  getRecentAuditEvents(limit?: number): StoredAuditEvent[] {
    return this.auditReader.getRecentEvents(limit);
  }
}
