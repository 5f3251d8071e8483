/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as axios } from 'axios';
import type { AxiosInstance } from 'axios';
import type { Readable } from 'node:stream';
import winston from 'winston';

import {
  DEFAULT_CONTENT_TYPE,
  HEALTHCHECK_CID,
  cacheControl,
} from '../constants.js';
import * as metrics from '../metrics.js';
import {
  ContentNamespace,
  ContentStreamer,
  StreamOutcome,
} from '../types.js';

const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;
const DEFAULT_IPNS_MAX_AGE_SECONDS = 60;
const HEALTHCHECK_TIMEOUT_MS = 5_000;
const HEALTHY_STATUSES = new Set([200, 301, 302, 404]);

export interface UpstreamHealth {
  reachable: boolean;
  status?: number;
  error?: string;
}

function headerString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function encodeContentPath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}

/**
 * Forwards allowed requests to the upstream IPFS daemon and hands back its
 * body as a stream. Failures are reported as outcomes rather than thrown.
 */
export class UpstreamProxyStreamer implements ContentStreamer {
  private log: winston.Logger;
  private upstreamAxios: AxiosInstance;
  private ipnsCacheControl: string;

  constructor({
    log,
    upstreamUrl,
    timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
    ipnsMaxAgeSeconds = DEFAULT_IPNS_MAX_AGE_SECONDS,
  }: {
    log: winston.Logger;
    upstreamUrl: string;
    timeoutMs?: number;
    ipnsMaxAgeSeconds?: number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.upstreamAxios = axios.create({
      baseURL: upstreamUrl,
      timeout: timeoutMs,
      // Status mapping happens below, never via thrown errors
      validateStatus: () => true,
      transitional: { clarifyTimeoutError: true },
    });
    this.ipnsCacheControl = `public, max-age=${ipnsMaxAgeSeconds}`;
  }

  async stream({
    namespace,
    path,
    signal,
  }: {
    namespace: ContentNamespace;
    path: string;
    signal?: AbortSignal;
  }): Promise<StreamOutcome> {
    const url = `/${namespace}/${encodeContentPath(path)}`;
    this.log.debug('Forwarding request upstream', { namespace, url });

    let outcome: StreamOutcome;
    try {
      const response = await this.upstreamAxios.get<Readable>(url, {
        responseType: 'stream',
        signal,
      });

      if (response.status === 404) {
        response.data.destroy();
        outcome = { kind: 'not-found' };
      } else {
        const stream = response.data;
        stream.on('error', (error: Error) => {
          metrics.upstreamStreamErrorsCounter.inc({ namespace });
          this.log.error('Upstream stream failed', {
            namespace,
            url,
            message: error.message,
          });
        });

        outcome = {
          kind: 'ok',
          stream,
          status: response.status,
          contentType:
            headerString(response.headers['content-type']) ??
            DEFAULT_CONTENT_TYPE,
          cacheControl: this.cacheControlFor(namespace, response.status),
        };
      }
    } catch (error) {
      outcome = this.failureOutcome(error);
      if (outcome.kind !== 'cancelled') {
        this.log.warn('Upstream request failed', {
          namespace,
          url,
          outcome: outcome.kind,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }

    metrics.upstreamRequestsCounter.inc({ namespace, outcome: outcome.kind });
    return outcome;
  }

  // Only successful answers are cacheable; an error must not stick for a year
  private cacheControlFor(namespace: ContentNamespace, status: number) {
    if (status < 200 || status >= 300) {
      return cacheControl.noStore;
    }
    return namespace === 'ipfs'
      ? cacheControl.immutable
      : this.ipnsCacheControl;
  }

  private failureOutcome(error: unknown): StreamOutcome {
    if (axios.isCancel(error)) {
      return { kind: 'cancelled' };
    }
    if (axios.isAxiosError(error)) {
      if (error.code === 'ETIMEDOUT' || error.code === 'ECONNABORTED') {
        return { kind: 'timeout' };
      }
      return { kind: 'unreachable', message: error.message };
    }
    return {
      kind: 'unreachable',
      message: error instanceof Error ? error.message : String(error),
    };
  }

  async checkHealth(): Promise<UpstreamHealth> {
    try {
      const response = await this.upstreamAxios.head(
        `/ipfs/${HEALTHCHECK_CID}`,
        { timeout: HEALTHCHECK_TIMEOUT_MS, maxRedirects: 0 },
      );
      return {
        reachable: HEALTHY_STATUSES.has(response.status),
        status: response.status,
      };
    } catch (error) {
      return {
        reachable: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
