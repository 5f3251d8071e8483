/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { BlockEntry, MergedBlocklist } from '../types.js';

/**
 * Union of the synced denylist and the operator overrides. Overrides win on
 * collision. Depends on nothing but its arguments.
 */
export function mergeBlocklists(
  denylist: readonly BlockEntry[],
  overrides: ReadonlyMap<string, string>,
): MergedBlocklist {
  const merged = new Map<string, string>();
  for (const { cid, reason } of denylist) {
    if (!merged.has(cid)) {
      merged.set(cid, reason);
    }
  }
  for (const [cid, reason] of overrides) {
    merged.set(cid, reason);
  }
  return merged;
}
