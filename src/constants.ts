/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export const headerNames = {
  blockReason: 'X-Block-Reason',
  blockJurisdiction: 'X-Block-Jurisdiction',
  blockReference: 'X-Block-Reference',
  upstreamStatus: 'X-Upstream-Status',
};

export const cacheControl = {
  // Content addressed by hash can never change
  immutable: 'public, max-age=29030400, immutable',
  noStore: 'no-cache, no-store, must-revalidate',
};

export const UNAVAILABLE_FOR_LEGAL_REASONS = 451;

// Reason recorded for override entries that carry no explicit reason
export const DEFAULT_OVERRIDE_REASON = 'policy_violation';

// Reason recorded for every entry taken from the synced denylist
export const DENYLIST_REASON = 'ipfs-official-denylist';

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

// Well-known empty directory CID requested by upstream health checks
export const HEALTHCHECK_CID = 'QmUNLLsPACCz1vLxQVkXqqLX5R1X345qqfHbsf67hvA3Nn';
