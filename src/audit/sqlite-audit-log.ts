/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import Sqlite from 'better-sqlite3';
import { default as fastq } from 'fastq';
import type { queueAsPromised } from 'fastq';
import fs from 'node:fs';
import path from 'node:path';
import * as winston from 'winston';

import * as metrics from '../metrics.js';
import {
  AuditEvent,
  AuditReader,
  AuditSink,
  StoredAuditEvent,
} from '../types.js';

const MAX_QUEUE_SIZE = 10000;
const DEFAULT_RECENT_LIMIT = 50;

interface AuditInsertParams {
  event_type: string;
  user_id: string | null;
  ip_address: string | null;
  cid: string | null;
  details: string | null;
  timestamp: string;
}

interface AuditRow {
  id: number;
  event_type: string;
  user_id: string | null;
  ip_address: string | null;
  cid: string | null;
  details: string | null;
  timestamp: string;
}

function serializeDetails(details: unknown): string | null {
  if (details === undefined || details === null) {
    return null;
  }
  if (typeof details === 'string') {
    return details;
  }
  try {
    return JSON.stringify(details);
  } catch {
    return String(details);
  }
}

/**
 * Audit trail kept in SQLite. `record` only enqueues; rows are written by a
 * single-concurrency queue so callers on the request path never wait on the
 * database and never see its errors.
 */
export class SqliteAuditLog implements AuditSink, AuditReader {
  private log: winston.Logger;
  private db: Sqlite.Database;
  private insertStmt: Sqlite.Statement<[AuditInsertParams]>;
  private recentStmt: Sqlite.Statement<[{ limit: number }], AuditRow>;
  private queue: queueAsPromised<AuditEvent, void>;

  constructor({ log, dbPath }: { log: winston.Logger; dbPath: string }) {
    this.log = log.child({ class: this.constructor.name });

    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Sqlite(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS audit_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        event_type TEXT NOT NULL,
        user_id TEXT,
        ip_address TEXT,
        cid TEXT,
        details TEXT,
        timestamp TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS audit_log_event_type_idx
        ON audit_log (event_type);
    `);

    this.insertStmt = this.db.prepare<AuditInsertParams>(`
      INSERT INTO audit_log (
        event_type, user_id, ip_address, cid, details, timestamp
      ) VALUES (
        @event_type, @user_id, @ip_address, @cid, @details, @timestamp
      )
    `);

    this.recentStmt = this.db.prepare<{ limit: number }, AuditRow>(`
      SELECT id, event_type, user_id, ip_address, cid, details, timestamp
      FROM audit_log
      ORDER BY id DESC
      LIMIT @limit
    `);

    this.queue = fastq.promise(this.write.bind(this), 1);
  }

  record(event: AuditEvent): void {
    try {
      if (this.queue.length() >= MAX_QUEUE_SIZE) {
        metrics.auditWriteErrorsCounter.inc();
        this.log.warn('Audit queue full, dropping event', {
          eventType: event.eventType,
        });
        return;
      }

      const stamped = { ...event, timestamp: event.timestamp ?? new Date() };
      this.log.info('Audit event', {
        eventType: stamped.eventType,
        cid: stamped.cid,
        ipAddress: stamped.ipAddress,
        details: stamped.details,
      });
      this.queue.push(stamped).catch((error: unknown) => {
        metrics.auditWriteErrorsCounter.inc();
        this.log.error('Failed to write audit event', {
          eventType: event.eventType,
          error,
        });
      });
    } catch (error) {
      metrics.auditWriteErrorsCounter.inc();
      this.log.error('Failed to queue audit event', {
        eventType: event.eventType,
        error,
      });
    }
  }

  private async write(event: AuditEvent): Promise<void> {
    this.insertStmt.run({
      event_type: event.eventType,
      user_id: event.userId ?? null,
      ip_address: event.ipAddress ?? null,
      cid: event.cid ?? null,
      details: serializeDetails(event.details),
      timestamp: (event.timestamp ?? new Date()).toISOString(),
    });
  }

  /** Resolves once every event queued so far has been written. */
  async flush(): Promise<void> {
    if (this.queue.idle()) {
      return;
    }
    await this.queue.drained();
  }

  getRecentEvents(limit = DEFAULT_RECENT_LIMIT): StoredAuditEvent[] {
    return this.recentStmt.all({ limit }).map((row) => ({
      id: row.id,
      eventType: row.event_type,
      cid: row.cid,
      ipAddress: row.ip_address,
      userId: row.user_id,
      details: row.details,
      timestamp: row.timestamp,
    }));
  }

  isHealthy(): boolean {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch (error) {
      this.log.error('Audit database check failed', { error });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.flush();
    this.db.close();
  }
}
