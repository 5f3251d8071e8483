/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { looksLikeCid } from './cid.js';

const NAMESPACE_MARKERS = ['/ipfs/', '/ipns/'];

/**
 * Extracts the CID from one line of an nginx-style denylist, e.g.
 *
 *   location ~ "^/ipfs/QmXYZ" { return 410; }
 *
 * Returns `undefined` for comments, for anything that is not a `location`
 * directive over an IPFS or IPNS path, and for tokens that do not look like
 * a CID.
 */
export function parseDenylistLine(line: string): string | undefined {
  if (line.startsWith('#') || !line.includes('location')) {
    return undefined;
  }

  for (const marker of NAMESPACE_MARKERS) {
    const start = line.indexOf(marker);
    if (start === -1) {
      continue;
    }
    const token = line.slice(start + marker.length).split(/["'/]/)[0];
    return looksLikeCid(token) ? token : undefined;
  }

  return undefined;
}

/**
 * Best-effort parse of a whole denylist document. Unknown lines are
 * skipped and repeated CIDs are kept once, in first-seen order.
 */
export function parseDenylist(text: string): string[] {
  const seen = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const cid = parseDenylistLine(line.trim());
    if (cid !== undefined) {
      seen.add(cid);
    }
  }
  return [...seen];
}
