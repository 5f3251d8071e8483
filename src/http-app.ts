/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as cors } from 'cors';
import express, { NextFunction, Request, Response } from 'express';
import { STATUS_CODES } from 'node:http';
import winston from 'winston';

import { headerNames } from './constants.js';
import { errorMessage } from './lib/error.js';
import * as metrics from './metrics.js';
import { createAbortSignalMiddleware } from './middleware/abort-signal.js';

/**
 * 4xx status carried by errors that body parsers and param decoding raise
 * for malformed requests.
 */
export function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const status =
    'status' in error
      ? error.status
      : 'statusCode' in error
        ? error.statusCode
        : undefined;
  return typeof status === 'number' && status >= 400 && status < 500
    ? status
    : undefined;
}

/**
 * Builds the Express app around already-constructed routers so tests can
 * mount the same middleware stack without the process-wide system.
 */
export function createHttpApp({
  log,
  routers,
}: {
  log: winston.Logger;
  routers: express.Router[];
}): express.Express {
  const app = express();

  app.use(
    cors({
      exposedHeaders: [
        // these are not exposed by default and must be added manually to be used on browsers
        'content-length',
        'content-encoding',
        ...Object.values(headerNames),
      ],
    }),
  );

  app.use(createAbortSignalMiddleware());

  for (const router of routers) {
    app.use(router);
  }

  app.use(
    (error: unknown, _req: Request, res: Response, next: NextFunction) => {
      const clientStatus = clientErrorStatus(error);
      if (clientStatus !== undefined && !res.headersSent) {
        log.debug('Rejected malformed request', {
          status: clientStatus,
          error: errorMessage(error),
        });
        res
          .status(clientStatus)
          .json({ error: STATUS_CODES[clientStatus] ?? 'Bad Request' });
        return;
      }

      metrics.errorsCounter.inc();
      log.error('Unhandled request error', { error: errorMessage(error) });
      if (res.headersSent) {
        next(error);
        return;
      }
      res.status(500).json({ error: 'Internal Server Error' });
    },
  );

  return app;
}
