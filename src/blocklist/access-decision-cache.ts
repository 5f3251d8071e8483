/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as winston from 'winston';

import * as metrics from '../metrics.js';
import {
  BlocklistStats,
  BlocklistValidator,
  DenylistSnapshot,
  DenylistSnapshotSource,
  MergedBlocklist,
  OverrideListSource,
} from '../types.js';
import { mergeBlocklists } from './merge.js';

const DEFAULT_WINDOW_MS = 300 * 1000;
const STATS_SAMPLE_SIZE = 10;

interface CacheEntry {
  overridesLoadedAt: number;
  overrides: ReadonlyMap<string, string>;
  snapshot: DenylistSnapshot | undefined;
  merged: MergedBlocklist;
}

/**
 * Answers "is this CID blocked, and why". The override list is re-read once
 * per window; the denylist snapshot is asked for on every lookup (the store
 * memoizes it) so a finished sync is visible to the very next request.
 */
export class AccessDecisionCache implements BlocklistValidator {
  private log: winston.Logger;
  private overrideSource: OverrideListSource;
  private snapshotSource: DenylistSnapshotSource;
  private windowMs: number;
  private now: () => number;
  private entry: CacheEntry | undefined;

  constructor({
    log,
    overrideSource,
    snapshotSource,
    windowMs = DEFAULT_WINDOW_MS,
    now = Date.now,
  }: {
    log: winston.Logger;
    overrideSource: OverrideListSource;
    snapshotSource: DenylistSnapshotSource;
    windowMs?: number;
    now?: () => number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.overrideSource = overrideSource;
    this.snapshotSource = snapshotSource;
    this.windowMs = windowMs;
    this.now = now;
  }

  private current(): CacheEntry {
    const now = this.now();
    const previous = this.entry;

    let overrides: ReadonlyMap<string, string>;
    let overridesLoadedAt: number;
    if (
      previous === undefined ||
      now - previous.overridesLoadedAt >= this.windowMs
    ) {
      // a failed read keeps whatever overrides were loaded before
      overrides =
        this.overrideSource.load() ?? previous?.overrides ?? new Map();
      overridesLoadedAt = now;
    } else {
      overrides = previous.overrides;
      overridesLoadedAt = previous.overridesLoadedAt;
    }

    const snapshot = this.snapshotSource.read();

    if (
      previous !== undefined &&
      previous.overrides === overrides &&
      previous.snapshot === snapshot
    ) {
      if (previous.overridesLoadedAt !== overridesLoadedAt) {
        this.entry = { ...previous, overridesLoadedAt };
        return this.entry;
      }
      return previous;
    }

    const merged = mergeBlocklists(snapshot?.entries ?? [], overrides);
    const entry: CacheEntry = {
      overridesLoadedAt,
      overrides,
      snapshot,
      merged,
    };
    this.entry = entry;

    metrics.blocklistEntriesGauge.set(merged.size);
    this.log.debug('Recomputed merged blocklist', {
      overrides: overrides.size,
      denylist: snapshot?.entries.length ?? 0,
      total: merged.size,
    });

    return entry;
  }

  isBlocked(cid: string): string | undefined {
    return this.current().merged.get(cid);
  }

  /** Forces both sources to be re-read on the next lookup. */
  reload(): number {
    if (this.entry !== undefined) {
      // expire the window but keep the old overrides as a read fallback
      this.entry = { ...this.entry, overridesLoadedAt: -Infinity };
    }
    const size = this.current().merged.size;
    this.log.info('Blocklist reloaded', { total: size });
    return size;
  }

  getStats(): BlocklistStats {
    const { merged, overrides, snapshot } = this.current();

    const byReason: Record<string, number> = {};
    for (const reason of merged.values()) {
      byReason[reason] = (byReason[reason] ?? 0) + 1;
    }

    return {
      total: merged.size,
      byReason,
      sampleCids: [...merged.keys()].slice(0, STATS_SAMPLE_SIZE),
      overrides: overrides.size,
      denylist: {
        entries: snapshot?.entries.length ?? 0,
        source: snapshot?.source,
        fetchedAt: snapshot?.fetchedAt?.toISOString(),
      },
    };
  }
}
