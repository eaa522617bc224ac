/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import express, { Express, Request, Response } from 'express';
import { default as asyncHandler } from 'express-async-handler';
import * as promClient from 'prom-client';

/**
 * Express app exposing a Prometheus registry. Served on its own port so
 * metrics never share a namespace with redirected paths.
 */
export function createMetricsApp({
  registry,
  path,
}: {
  registry: promClient.Registry;
  path: string;
}): Express {
  const app = express();

  app.get(
    path,
    asyncHandler(async (_req: Request, res: Response) => {
      res.type(registry.contentType).send(await registry.metrics());
    }),
  );

  return app;
}
