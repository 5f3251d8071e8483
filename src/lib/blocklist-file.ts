/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { BlockEntry, DenylistSnapshot } from '../types.js';

const SOURCE_HEADER = '# Source:';
const DOWNLOADED_HEADER = '# Downloaded:';

/**
 * Parses the `<cid> [reason]` line format shared by the override list and
 * the denylist snapshot. Blank lines and `#` comments are ignored; the
 * reason is everything after the first run of whitespace.
 */
export function parseBlocklistText(
  text: string,
  defaultReason: string,
): BlockEntry[] {
  const entries: BlockEntry[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) {
      continue;
    }

    const match = line.match(/^(\S+)(?:\s+(.+))?$/);
    if (match === null) {
      continue;
    }
    const [, cid, reason] = match;
    entries.push({ cid, reason: reason?.trim() || defaultReason });
  }

  return entries;
}

export function parseSnapshotText(
  text: string,
  defaultReason: string,
): DenylistSnapshot {
  let source: string | undefined;
  let fetchedAt: Date | undefined;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line.startsWith('#')) {
      // headers only appear before the first entry
      if (line !== '') break;
      continue;
    }
    if (line.startsWith(SOURCE_HEADER)) {
      source = line.slice(SOURCE_HEADER.length).trim();
    } else if (line.startsWith(DOWNLOADED_HEADER)) {
      const parsed = new Date(line.slice(DOWNLOADED_HEADER.length).trim());
      fetchedAt = Number.isNaN(parsed.getTime()) ? undefined : parsed;
    }
  }

  return {
    source,
    fetchedAt,
    entries: parseBlocklistText(text, defaultReason),
  };
}

export function serializeSnapshot(snapshot: DenylistSnapshot): string {
  const lines = ['# Denylist snapshot - generated by denylist sync, do not edit'];
  if (snapshot.source !== undefined) {
    lines.push(`${SOURCE_HEADER} ${snapshot.source}`);
  }
  if (snapshot.fetchedAt !== undefined) {
    lines.push(`${DOWNLOADED_HEADER} ${snapshot.fetchedAt.toISOString()}`);
  }
  lines.push('');
  for (const { cid, reason } of snapshot.entries) {
    lines.push(`${cid} ${reason}`);
  }
  return lines.join('\n') + '\n';
}
