/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Handler, Request, Response } from 'express';

/**
 * Attaches an AbortSignal to each request that fires when the client
 * disconnects before the response completes. The gateway passes it to the
 * upstream request so abandoned downloads stop pulling from the daemon.
 */
export function createAbortSignalMiddleware(): Handler {
  return (req: Request, res: Response, next) => {
    const controller = new AbortController();

    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    req.signal = controller.signal;

    next();
  };
}
