/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import express from 'express';
import { strict as assert } from 'node:assert';
import { once } from 'node:events';
import http from 'node:http';
import { PassThrough } from 'node:stream';
import { after, before, beforeEach, describe, it } from 'node:test';
import request from 'supertest';

import {
  MapBlocklist,
  RecordingAuditSink,
  StubStreamer,
  okOutcome,
  stubBlockedCid,
  stubCid,
} from '../test/stubs.js';
import { createTestLogger } from '../test/test-logger.js';
import {
  GatewayDispatcher,
  escapeHtml,
  extractCid,
} from './gateway-dispatcher.js';
import { createDefaultProfiles } from './jurisdictions/index.js';
import { JurisdictionRegistry } from './jurisdictions/registry.js';
import { UpstreamProxyStreamer } from './proxy/upstream-proxy-streamer.js';
import { ContentNamespace, StreamOutcome } from './types.js';

const log = createTestLogger({ suite: 'GatewayDispatcher' });

const createApp = (
  dispatcher: GatewayDispatcher,
  namespace: ContentNamespace,
  path: string,
  language?: string,
) => {
  const app = express();
  app.get('/', (_req, res, next) => {
    dispatcher
      .dispatch({ namespace, path, res, language, ipAddress: '203.0.113.7' })
      .catch(next);
  });
  return app;
};

const listen = async (app: express.Express) => {
  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not bound to a TCP port');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
};

const shutdown = (server: http.Server) => {
  server.closeAllConnections();
  server.close();
};

describe('GatewayDispatcher', () => {
  let auditSink: RecordingAuditSink;
  let jurisdictions: JurisdictionRegistry;
  let outcome: () => StreamOutcome;
  let streamer: StubStreamer;
  let dispatcher: GatewayDispatcher;

  const serve = (
    namespace: ContentNamespace,
    path: string,
    language?: string,
  ) => request(createApp(dispatcher, namespace, path, language)).get('/');

  beforeEach(() => {
    auditSink = new RecordingAuditSink();
    jurisdictions = new JurisdictionRegistry({
      log,
      profiles: createDefaultProfiles(),
      defaultCountry: 'US',
    });
    outcome = () => okOutcome('hello world');
    streamer = new StubStreamer(() => outcome());
    dispatcher = new GatewayDispatcher({
      log,
      blocklist: new MapBlocklist(
        new Map([
          [stubBlockedCid, 'malware'],
          ['QmScriptCid1', '<b>bad</b>'],
        ]),
      ),
      streamer,
      jurisdictions,
      auditSink,
    });
  });

  describe('decide', () => {
    it('should block listed CIDs regardless of sub-path', () => {
      assert.deepEqual(
        dispatcher.decide('ipfs', `${stubBlockedCid}/index.html`),
        { action: 'block', cid: stubBlockedCid, reason: 'malware' },
      );
    });

    it('should allow CIDs that are not listed', () => {
      assert.deepEqual(dispatcher.decide('ipns', stubCid), {
        action: 'allow',
        cid: stubCid,
      });
    });
  });

  describe('dispatch', () => {
    it('should refuse blocked content with 451 and legal headers', async () => {
      const res = await serve('ipfs', `${stubBlockedCid}/page.html`);

      assert.equal(res.status, 451);
      assert.equal(
        res.headers['cache-control'],
        'no-cache, no-store, must-revalidate',
      );
      assert.equal(res.headers['x-block-reason'], 'malware');
      assert.equal(res.headers['x-block-jurisdiction'], 'US');
      assert.match(res.headers['x-block-reference'] ?? '', /^[0-9a-f]{8}$/);
      assert.equal(res.body.reference, res.headers['x-block-reference']);
      assert.equal(res.body.error, 'Unavailable For Legal Reasons');
      assert.equal(res.body.status, 451);
      assert.equal(res.body.cid, stubBlockedCid);
      assert.equal(res.body.jurisdiction, 'US');
      assert.equal(res.body.reason, 'malware');
      assert.equal(res.body.reasonText, 'Malware detected');
      assert.equal(res.body.law, '17 U.S.C. § 512');
      assert.equal(res.body.link, '/copyright/counter-notice-template');
      assert.equal(streamer.calls.length, 0);
    });

    it('should audit blocklist hits with the namespace and reason', async () => {
      await serve('ipns', stubBlockedCid);

      assert.deepEqual(auditSink.events, [
        {
          eventType: 'BLOCKLIST_HIT',
          cid: stubBlockedCid,
          ipAddress: '203.0.113.7',
          details: { namespace: 'ipns', reason: 'malware' },
        },
      ]);
    });

    it('should render an escaped HTML page for browsers', async () => {
      const res = await serve('ipfs', 'QmScriptCid1').set(
        'Accept',
        'text/html',
      );

      assert.equal(res.status, 451);
      assert.match(res.headers['content-type'] ?? '', /^text\/html/);
      assert.ok(res.text.includes('<strong>&lt;b&gt;bad&lt;/b&gt;</strong>'));
      assert.ok(res.text.includes('DMCA Compliant Gateway (USA)'));
    });

    it('should use the requested language of the active profile', async () => {
      jurisdictions.setActive('PL');

      const res = await serve('ipfs', stubBlockedCid, 'pl');

      assert.equal(res.body.reasonText, 'Wykryto złośliwe oprogramowanie');
      assert.equal(res.headers['x-block-jurisdiction'], 'PL');
    });

    it('should stream allowed content with upstream headers', async () => {
      const res = await serve('ipfs', `/${stubCid}/docs/a.txt`);

      assert.equal(res.status, 200);
      assert.equal(res.text, 'hello world');
      assert.equal(res.headers['content-type'], 'text/plain');
      assert.equal(
        res.headers['cache-control'],
        'public, max-age=29030400, immutable',
      );
      assert.equal(res.headers['x-upstream-status'], '200');
      assert.deepEqual(streamer.calls, [
        { namespace: 'ipfs', path: `${stubCid}/docs/a.txt` },
      ]);
      assert.deepEqual(auditSink.eventTypes(), ['CID_ACCESS']);
    });

    it('should pass a non-2xx upstream status through in the header', async () => {
      outcome = () => ({
        ...okOutcome('upstream broke'),
        status: 502,
        cacheControl: 'no-cache, no-store, must-revalidate',
      });

      const res = await serve('ipfs', stubCid);

      assert.equal(res.status, 502);
      assert.equal(res.headers['x-upstream-status'], '502');
      assert.equal(
        res.headers['cache-control'],
        'no-cache, no-store, must-revalidate',
      );
    });

    it('should truncate the response when the upstream body fails mid-stream', async () => {
      const body = new PassThrough();
      body.write('partial');
      outcome = () => ({
        kind: 'ok',
        stream: body,
        status: 200,
        contentType: 'text/plain',
        cacheControl: 'public, max-age=29030400, immutable',
      });
      const { server, baseUrl } = await listen(
        createApp(dispatcher, 'ipfs', stubCid),
      );

      try {
        const received = await new Promise<{
          status?: number;
          text: string;
          complete: boolean;
        }>((resolve, reject) => {
          http
            .get(`${baseUrl}/`, (res) => {
              let text = '';
              res.setEncoding('utf8');
              res.on('data', (chunk: string) => {
                text += chunk;
                body.destroy(new Error('upstream reset'));
              });
              // the socket is torn down before the body ends
              res.on('error', () => undefined);
              res.on('close', () =>
                resolve({ status: res.statusCode, text, complete: res.complete }),
              );
            })
            .on('error', reject);
        });

        assert.equal(received.status, 200);
        assert.equal(received.text, 'partial');
        assert.equal(received.complete, false);

        outcome = () => okOutcome('hello world');
        const next = await request(baseUrl).get('/');
        assert.equal(next.status, 200);
        assert.equal(next.text, 'hello world');
      } finally {
        shutdown(server);
      }
    });

    it('should refuse dot segments before checking the blocklist', async () => {
      const res = await serve('ipfs', `${stubCid}/../${stubBlockedCid}`);

      assert.equal(res.status, 400);
      assert.deepEqual(res.body, { error: 'Invalid path' });
      assert.equal(streamer.calls.length, 0);
      assert.equal(auditSink.events.length, 0);
    });

    it('should audit IPNS access separately', async () => {
      await serve('ipns', 'k51qzi5uqu5dtestname');

      assert.deepEqual(auditSink.eventTypes(), ['IPNS_ACCESS']);
    });

    it('should answer 404 when upstream has no such content', async () => {
      outcome = () => ({ kind: 'not-found' });

      const res = await serve('ipfs', stubCid);

      assert.equal(res.status, 404);
      assert.deepEqual(res.body, { error: 'Not Found' });
    });

    it('should answer 504 and audit upstream timeouts', async () => {
      outcome = () => ({ kind: 'timeout' });

      const res = await serve('ipfs', stubCid);

      assert.equal(res.status, 504);
      assert.deepEqual(res.body, { error: 'Gateway Timeout' });
      assert.deepEqual(auditSink.eventTypes(), [
        'CID_ACCESS',
        'UPSTREAM_TIMEOUT',
      ]);
    });

    it('should answer 503 when upstream is unreachable', async () => {
      outcome = () => ({ kind: 'unreachable', message: 'connect refused' });

      const res = await serve('ipfs', stubCid);

      assert.equal(res.status, 503);
      assert.deepEqual(res.body, { error: 'Service Unavailable' });
      assert.deepEqual(auditSink.events[1]?.details, {
        namespace: 'ipfs',
        message: 'connect refused',
      });
    });

    it('should reject a request without a CID', async () => {
      const res = await serve('ipfs', '/');

      assert.equal(res.status, 400);
      assert.deepEqual(res.body, { error: 'Missing CID' });
      assert.equal(auditSink.events.length, 0);
    });
  });
});

describe('escapeHtml', () => {
  it('should escape markup and quotes', () => {
    assert.equal(
      escapeHtml(`<a href="x">'&'</a>`),
      '&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;',
    );
  });
});

describe('extractCid', () => {
  it('should split the CID from the sub-path', () => {
    assert.deepEqual(extractCid('/QmTestCid1/a/b.txt'), {
      cid: 'QmTestCid1',
      subPath: 'a/b.txt',
    });
  });
});

describe('GatewayDispatcher with a live upstream', () => {
  const upstreamPaths: string[] = [];
  let upstream: { server: http.Server; baseUrl: string };
  let dispatcher: GatewayDispatcher;

  before(async () => {
    const app = express();
    app.get('*', (req, res) => {
      upstreamPaths.push(req.originalUrl);
      res
        .status(req.originalUrl.endsWith('/broken') ? 500 : 200)
        .type('text/plain')
        .send(`upstream served ${req.originalUrl}`);
    });
    upstream = await listen(app);
  });

  after(() => {
    shutdown(upstream.server);
  });

  beforeEach(() => {
    upstreamPaths.length = 0;
    dispatcher = new GatewayDispatcher({
      log,
      blocklist: new MapBlocklist(new Map([[stubBlockedCid, 'malware']])),
      streamer: new UpstreamProxyStreamer({ log, upstreamUrl: upstream.baseUrl }),
      jurisdictions: new JurisdictionRegistry({
        log,
        profiles: createDefaultProfiles(),
        defaultCountry: 'US',
      }),
      auditSink: new RecordingAuditSink(),
    });
  });

  const serve = (namespace: ContentNamespace, path: string) =>
    request(createApp(dispatcher, namespace, path)).get('/');

  it('should proxy allowed content', async () => {
    const res = await serve('ipfs', `${stubCid}/a.txt`);

    assert.equal(res.status, 200);
    assert.equal(res.text, `upstream served /ipfs/${stubCid}/a.txt`);
    assert.equal(res.headers['x-upstream-status'], '200');
    assert.equal(
      res.headers['cache-control'],
      'public, max-age=29030400, immutable',
    );
    assert.deepEqual(upstreamPaths, [`/ipfs/${stubCid}/a.txt`]);
  });

  it('should not mark upstream errors as cacheable', async () => {
    const res = await serve('ipfs', `${stubCid}/broken`);

    assert.equal(res.status, 500);
    assert.equal(res.headers['x-upstream-status'], '500');
    assert.equal(
      res.headers['cache-control'],
      'no-cache, no-store, must-revalidate',
    );
  });

  it('should refuse blocked content without contacting upstream', async () => {
    const res = await serve('ipfs', stubBlockedCid);

    assert.equal(res.status, 451);
    assert.deepEqual(upstreamPaths, []);
  });

  const traversals: [ContentNamespace, string][] = [
    ['ipfs', `x/../${stubBlockedCid}`],
    ['ipfs', `./${stubBlockedCid}`],
    ['ipns', `name/../../ipfs/${stubBlockedCid}`],
    ['ipfs', `x/%2e%2e/${stubBlockedCid}`],
    ['ipfs', `${stubCid}/.`],
  ];

  for (const [namespace, path] of traversals) {
    it(`should refuse /${namespace}/${path} without contacting upstream`, async () => {
      const res = await serve(namespace, path);

      assert.equal(res.status, 400);
      assert.deepEqual(res.body, { error: 'Invalid path' });
      assert.deepEqual(upstreamPaths, []);
    });
  }
});
