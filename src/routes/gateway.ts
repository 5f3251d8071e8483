/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Request, Response, Router } from 'express';
import { default as asyncHandler } from 'express-async-handler';

import { GatewayDispatcher } from '../gateway-dispatcher.js';
import { JurisdictionRegistry } from '../jurisdictions/registry.js';
import { ContentNamespace } from '../types.js';

const CONTENT_PATH_REGEX = /^\/(ipfs|ipns)\/(.+)$/;

function isNamespace(value: string | undefined): value is ContentNamespace {
  return value === 'ipfs' || value === 'ipns';
}

/**
 * Explicit `?lang=` wins, then Accept-Language negotiated against the
 * languages the active profile has copy for.
 */
export function requestLanguage(
  req: Request,
  jurisdictions: JurisdictionRegistry,
): string | undefined {
  const { lang } = req.query;
  if (typeof lang === 'string' && lang !== '') {
    return lang.toLowerCase();
  }

  const languages = jurisdictions.getActive()?.languages ?? [];
  if (languages.length === 0) {
    return undefined;
  }
  const accepted = req.acceptsLanguages([...languages]);
  return accepted === false ? undefined : accepted;
}

export function createGatewayRouter({
  dispatcher,
  jurisdictions,
}: {
  dispatcher: GatewayDispatcher;
  jurisdictions: JurisdictionRegistry;
}): Router {
  const router = Router();

  // Legacy form links: /ipfs?cid=<cid>
  router.get('/ipfs', (req: Request, res: Response) => {
    const { cid } = req.query;
    if (typeof cid !== 'string' || cid === '') {
      res.status(400).json({ error: 'Missing CID' });
      return;
    }
    res.redirect(302, `/ipfs/${encodeURIComponent(cid)}`);
  });

  router.get(
    CONTENT_PATH_REGEX,
    asyncHandler(async (req: Request, res: Response) => {
      const namespace = req.params[0];
      const path = req.params[1];
      if (!isNamespace(namespace) || path === undefined) {
        res.status(404).json({ error: 'Not Found' });
        return;
      }

      await dispatcher.dispatch({
        namespace,
        path,
        res,
        signal: req.signal,
        language: requestLanguage(req, jurisdictions),
        ipAddress: req.ip,
      });
    }),
  );

  return router;
}
