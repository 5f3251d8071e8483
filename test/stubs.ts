/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Readable } from 'node:stream';

import {
  AuditEvent,
  AuditReader,
  AuditSink,
  BlocklistValidator,
  ContentNamespace,
  ContentStreamer,
  DenylistSnapshot,
  DenylistSnapshotSource,
  OverrideListSource,
  StoredAuditEvent,
  StreamOutcome,
} from '../src/types.js';

export const stubCid = 'QmTestCid1';
export const stubBlockedCid = 'QmBlockedCid1';

export class RecordingAuditSink implements AuditSink, AuditReader {
  events: AuditEvent[] = [];

  record(event: AuditEvent): void {
    this.events.push(event);
  }

  eventTypes(): string[] {
    return this.events.map((event) => event.eventType);
  }

  getRecentEvents(limit = 50): StoredAuditEvent[] {
    return this.events
      .map((event, index) => ({
        id: index + 1,
        eventType: event.eventType,
        cid: event.cid ?? null,
        ipAddress: event.ipAddress ?? null,
        userId: event.userId ?? null,
        details:
          event.details === undefined ? null : JSON.stringify(event.details),
        timestamp: new Date(0).toISOString(),
      }))
      .reverse()
      .slice(0, limit);
  }
}

export class MapBlocklist implements BlocklistValidator {
  constructor(private entries: Map<string, string> = new Map()) {}

  isBlocked(cid: string): string | undefined {
    return this.entries.get(cid);
  }
}

export class StubStreamer implements ContentStreamer {
  calls: { namespace: ContentNamespace; path: string }[] = [];

  constructor(private outcome: () => StreamOutcome) {}

  async stream({
    namespace,
    path,
  }: {
    namespace: ContentNamespace;
    path: string;
  }): Promise<StreamOutcome> {
    this.calls.push({ namespace, path });
    return this.outcome();
  }
}

export const okOutcome = (
  body: string,
  contentType = 'text/plain',
): StreamOutcome => ({
  kind: 'ok',
  stream: Readable.from([body]),
  status: 200,
  contentType,
  cacheControl: 'public, max-age=29030400, immutable',
});

export class MemoryOverrideSource implements OverrideListSource {
  constructor(public value: Map<string, string> | undefined = new Map()) {}

  load(): Map<string, string> | undefined {
    return this.value === undefined ? undefined : new Map(this.value);
  }
}

export class MemorySnapshotStore implements DenylistSnapshotSource {
  modified: Date | undefined;

  constructor(public snapshot?: DenylistSnapshot) {}

  read(): DenylistSnapshot | undefined {
    return this.snapshot;
  }

  async replace(snapshot: DenylistSnapshot): Promise<void> {
    this.snapshot = snapshot;
    this.modified = snapshot.fetchedAt;
  }

  lastModified(): Date | undefined {
    return this.modified;
  }
}
