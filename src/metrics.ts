/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as promClient from 'prom-client';

export const registry = promClient.register;

//
// Global error metrics
//

export const errorsCounter = new promClient.Counter({
  name: 'errors_total',
  help: 'Total error count',
});

export const uncaughtExceptionCounter = new promClient.Counter({
  name: 'uncaught_exceptions_total',
  help: 'Count of uncaught exceptions',
});

//
// Access decisions
//

export const blocklistHitsCounter = new promClient.Counter({
  name: 'blocklist_hits_total',
  help: 'Count of requests refused because the CID is blocked',
  labelNames: ['namespace', 'reason'],
});

export const blocklistEntriesGauge = new promClient.Gauge({
  name: 'blocklist_entries',
  help: 'Number of CIDs in the merged blocklist',
});

//
// Denylist sync
//

export const denylistSyncCounter = new promClient.Counter({
  name: 'denylist_syncs_total',
  help: 'Count of denylist sync attempts',
  labelNames: ['status'],
});

export const denylistEntriesGauge = new promClient.Gauge({
  name: 'denylist_entries',
  help: 'Number of entries accepted by the last successful denylist sync',
});

export const denylistLastSyncTimestampSeconds = new promClient.Gauge({
  name: 'denylist_last_sync_timestamp_seconds',
  help: 'Timestamp of the last successful denylist sync',
});

//
// Upstream proxy
//

export const upstreamRequestsCounter = new promClient.Counter({
  name: 'upstream_requests_total',
  help: 'Count of requests forwarded to the upstream daemon by outcome',
  labelNames: ['namespace', 'outcome'],
});

export const upstreamStreamErrorsCounter = new promClient.Counter({
  name: 'upstream_stream_errors_total',
  help: 'Count of upstream bodies that failed after streaming began',
  labelNames: ['namespace'],
});

//
// Compliance
//

export const noticesCounter = new promClient.Counter({
  name: 'notices_total',
  help: 'Count of takedown notices received',
  labelNames: ['jurisdiction', 'status'],
});

export const auditWriteErrorsCounter = new promClient.Counter({
  name: 'audit_write_errors_total',
  help: 'Count of audit events that could not be persisted',
});
