/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Request, Response, Router } from 'express';
import { default as asyncHandler } from 'express-async-handler';

import { requestInfoFromExpress } from '../../lib/http-utils.js';
import { RedirectDispatcher } from './dispatcher.js';

export function createRedirectRouter({
  dispatcher,
}: {
  dispatcher: RedirectDispatcher;
}): Router {
  const router = Router();

  // Every method and path belongs to the redirect records
  router.use(
    asyncHandler(async (req: Request, res: Response) => {
      await dispatcher.dispatch({
        request: requestInfoFromExpress(req),
        res,
        signal: req.signal,
      });
    }),
  );

  return router;
}
