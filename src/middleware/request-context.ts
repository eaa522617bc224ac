/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Handler, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import winston from 'winston';

import { headerNames } from '../constants.js';
import { firstHeaderValue } from '../lib/http-utils.js';

/**
 * Middleware that attaches a request ID, a request scoped logger and an
 * AbortSignal to each request. The signal is aborted when the client
 * disconnects before the response completes.
 */
export function createRequestContextMiddleware({
  log,
}: {
  log: winston.Logger;
}): Handler {
  return (req: Request, res: Response, next) => {
    const controller = new AbortController();

    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    const id =
      firstHeaderValue(req.headers[headerNames.requestId.toLowerCase()]) ??
      randomUUID();

    req.id = id;
    req.log = log.child({ requestId: id });
    req.signal = controller.signal;
    res.header(headerNames.requestId, id);

    next();
  };
}
