/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as cors } from 'cors';
import express from 'express';
import { Server } from 'node:http';

import * as config from './config.js';
import { headerNames } from './constants.js';
import log from './log.js';
import { registry } from './metrics.js';
import { createMetricsApp } from './metrics-server.js';
import { createRequestContextMiddleware } from './middleware/request-context.js';
import { createRedirectRouter } from './routes/redirect/index.js';
import * as system from './system.js';

// HTTP server
const app = express();

app.disable('x-powered-by');

app.use(
  cors({
    exposedHeaders: [
      // these are not exposed by default and must be added manually to be used on browsers
      'location',
      ...Object.values(headerNames),
    ],
  }),
);

app.use(createRequestContextMiddleware({ log }));
app.use(createRedirectRouter({ dispatcher: system.dispatcher }));

const server: Server = app.listen(config.PORT, () => {
  log.info(`Listening on port ${config.PORT}`);
});

let metricsServer: Server | undefined;
if (config.METRICS_ENABLED) {
  metricsServer = createMetricsApp({
    registry,
    path: config.METRICS_PATH,
  }).listen(config.METRICS_PORT, () => {
    log.info(
      `Metrics listening on port ${config.METRICS_PORT} at ${config.METRICS_PATH}`,
    );
  });
}

const shutdown = (signal: string) => {
  log.info('Shutting down', { signal });
  metricsServer?.close();
  server.close((error) => {
    if (error !== undefined) {
      log.error('Error closing HTTP server', { error: error.message });
      process.exitCode = 1;
    }
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export { server, metricsServer };
