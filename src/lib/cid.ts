/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

// CIDv0 (base58btc sha2-256), CIDv1 dag-pb and raw in base32, and
// libp2p-key IPNS names in base36
export const KNOWN_CID_PREFIXES = ['Qm', 'bafy', 'bafk', 'k51'] as const;

/**
 * Cheap structural check. Does not decode multibase or multihash, so a
 * string that passes is only "shaped like" a CID.
 */
export function looksLikeCid(value: unknown): value is string {
  return (
    typeof value === 'string' &&
    KNOWN_CID_PREFIXES.some(
      (prefix) => value.startsWith(prefix) && value.length > prefix.length,
    )
  );
}

/**
 * Splits a gateway path into the leading CID (or IPNS name) and the
 * remaining sub-path, which is forwarded upstream untouched.
 */
export function splitContentPath(path: string): {
  cid: string;
  subPath: string;
} {
  const trimmed = path.replace(/^\/+/, '');
  const slashIndex = trimmed.indexOf('/');
  if (slashIndex === -1) {
    return { cid: trimmed, subPath: '' };
  }
  return {
    cid: trimmed.slice(0, slashIndex),
    subPath: trimmed.slice(slashIndex + 1),
  };
}

const DOT_SEGMENT_REGEX = /^(?:\.|%2e){1,2}$/i;

/**
 * True when any segment is `.` or `..`, literally or percent-encoded. URL
 * resolution collapses such segments, so the CID checked here would not be
 * the CID fetched upstream.
 */
export function hasDotSegment(path: string): boolean {
  return path.split('/').some((segment) => DOT_SEGMENT_REGEX.test(segment));
}
