/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { existsSync, readFileSync } from 'node:fs';

import * as env from './lib/env.js';

//
// HTTP server
//

// HTTP server port
export const PORT = env.positiveIntOrDefault('PORT', 8081);

// API key for accessing admin HTTP endpoints
export let ADMIN_API_KEY = env.varOrRandom('ADMIN_API_KEY');

const ADMIN_API_KEY_FILE = env.varOrUndefined('ADMIN_API_KEY_FILE');

if (ADMIN_API_KEY_FILE !== undefined) {
  if (!existsSync(ADMIN_API_KEY_FILE)) {
    throw new Error(`ADMIN_API_KEY_FILE not found: ${ADMIN_API_KEY_FILE}`);
  }
  ADMIN_API_KEY = readFileSync(ADMIN_API_KEY_FILE).toString().trim();
}

//
// Upstream IPFS daemon
//

// HTTP gateway of the local IPFS daemon
export const UPSTREAM_GATEWAY_URL = env.varOrDefault(
  'UPSTREAM_GATEWAY_URL',
  'http://127.0.0.1:8080',
);

// Deadline for the upstream to start answering
export const UPSTREAM_TIMEOUT_MS = env.positiveIntOrDefault(
  'UPSTREAM_TIMEOUT_MS',
  120_000,
);

// IPNS records are mutable, so they only get a short cache lifetime
export const IPNS_CACHE_MAX_AGE_SECONDS = env.positiveIntOrDefault(
  'IPNS_CACHE_MAX_AGE_SECONDS',
  60,
);

//
// Blocklists
//

// Operator-maintained `<cid> [reason]` list; wins over the denylist
export const OVERRIDE_LIST_FILE = env.varOrDefault(
  'OVERRIDE_LIST_FILE',
  'data/blocklist/override.txt',
);

// Local copy of the public denylist, rewritten by each sync
export const DENYLIST_SNAPSHOT_FILE = env.varOrDefault(
  'DENYLIST_SNAPSHOT_FILE',
  'data/blocklist/denylist-snapshot.txt',
);

export const DENYLIST_URL = env.varOrDefault(
  'DENYLIST_URL',
  'https://raw.githubusercontent.com/ipfs/infra/master/ipfs/gateway/denylist.conf',
);

export const DENYLIST_FETCH_TIMEOUT_MS = env.positiveIntOrDefault(
  'DENYLIST_FETCH_TIMEOUT_MS',
  30_000,
);

export const DENYLIST_SYNC_INTERVAL_SECONDS = env.positiveIntOrDefault(
  'DENYLIST_SYNC_INTERVAL_SECONDS',
  60 * 60 * 24,
);

// A snapshot older than this is refreshed at startup
export const DENYLIST_MAX_AGE_SECONDS = env.positiveIntOrDefault(
  'DENYLIST_MAX_AGE_SECONDS',
  60 * 60 * 24,
);

export const ENABLE_DENYLIST_SYNC = env.booleanOrDefault(
  'ENABLE_DENYLIST_SYNC',
  true,
);

// How long override list edits may take to become visible
export const BLOCKLIST_CACHE_WINDOW_SECONDS = env.positiveIntOrDefault(
  'BLOCKLIST_CACHE_WINDOW_SECONDS',
  300,
);

//
// Compliance
//

export const DEFAULT_JURISDICTION = env
  .varOrDefault('DEFAULT_JURISDICTION', 'US')
  .toUpperCase();

//
// Audit log
//

export const AUDIT_DB_PATH = env.varOrDefault(
  'AUDIT_DB_PATH',
  'data/sqlite/audit.db',
);
