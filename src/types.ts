/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { Readable } from 'node:stream';

export interface BlockEntry {
  cid: string;
  reason: string;
}

export interface DenylistSnapshot {
  source: string | undefined;
  fetchedAt: Date | undefined;
  entries: readonly BlockEntry[];
}

export type MergedBlocklist = ReadonlyMap<string, string>;

export interface OverrideListSource {
  /** Returns `undefined` when the source could not be read. */
  load(): Map<string, string> | undefined;
}

export interface DenylistSnapshotSource {
  /** Latest snapshot, or `undefined` when none has been written yet. */
  read(): DenylistSnapshot | undefined;
  replace(snapshot: DenylistSnapshot): Promise<void>;
  lastModified(): Date | undefined;
}

export interface BlocklistValidator {
  isBlocked(cid: string): string | undefined;
}

export interface BlocklistStats {
  total: number;
  byReason: Record<string, number>;
  sampleCids: string[];
  overrides: number;
  denylist: {
    entries: number;
    source: string | undefined;
    fetchedAt: string | undefined;
  };
}

//
// Upstream proxy
//

export type ContentNamespace = 'ipfs' | 'ipns';

export type StreamOutcome =
  | {
      kind: 'ok';
      stream: Readable;
      status: number;
      contentType: string;
      cacheControl: string;
    }
  | { kind: 'not-found' }
  | { kind: 'timeout' }
  | { kind: 'unreachable'; message: string }
  | { kind: 'cancelled' };

export interface ContentStreamer {
  stream(params: {
    namespace: ContentNamespace;
    path: string;
    signal?: AbortSignal;
  }): Promise<StreamOutcome>;
}

//
// Audit
//

export interface AuditEvent {
  eventType: string;
  cid?: string;
  ipAddress?: string;
  userId?: string;
  details?: unknown;
  timestamp?: Date;
}

export interface StoredAuditEvent {
  id: number;
  eventType: string;
  cid: string | null;
  ipAddress: string | null;
  userId: string | null;
  details: string | null;
  timestamp: string;
}

/**
 * Fire-and-forget sink. Implementations must never throw from `record` and
 * must not make the caller wait on storage.
 */
export interface AuditSink {
  record(event: AuditEvent): void;
}

export interface AuditReader {
  getRecentEvents(limit?: number): StoredAuditEvent[];
}
