/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

//==============================================================================
// Content access
//==============================================================================

/** A CID was requested through the /ipfs namespace */
export const CID_ACCESS = 'CID_ACCESS';

/** A name was requested through the /ipns namespace */
export const IPNS_ACCESS = 'IPNS_ACCESS';

/** A request was refused because its CID is on the blocklist */
export const BLOCKLIST_HIT = 'BLOCKLIST_HIT';

/** The upstream daemon did not answer before the deadline */
export const UPSTREAM_TIMEOUT = 'UPSTREAM_TIMEOUT';

/** The upstream daemon could not be reached */
export const UPSTREAM_ERROR = 'UPSTREAM_ERROR';

//==============================================================================
// Blocklist administration
//==============================================================================

/** The merged blocklist was reloaded on request */
export const BLOCKLIST_RELOAD = 'BLOCKLIST_RELOAD';

/** A denylist sync replaced the local snapshot */
export const DENYLIST_SYNC = 'DENYLIST_SYNC';

/** A denylist sync failed and the previous snapshot was kept */
export const DENYLIST_SYNC_FAILED = 'DENYLIST_SYNC_FAILED';

//==============================================================================
// Compliance
//==============================================================================

/** The active jurisdiction profile was switched */
export const JURISDICTION_CHANGE = 'JURISDICTION_CHANGE';

/** A takedown notice passed validation */
export const NOTICE_SUBMITTED = 'NOTICE_SUBMITTED';

/** A takedown notice was rejected by validation */
export const NOTICE_REJECTED = 'NOTICE_REJECTED';

//==============================================================================
// Lifecycle
//==============================================================================

export const SERVICE_STARTUP = 'SERVICE_STARTUP';
