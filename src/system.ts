/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import * as config from './config.js';
import { DockerV2Redirector } from './handlers/dockerv2.js';
import { GoMetaPageRenderer } from './handlers/gometa.js';
import { GoModsRedirector } from './handlers/gomods.js';
import { AxiosProxyForwarder } from './handlers/proxy-forwarder.js';
import { DnsTxtResolver } from './lib/dns-resolver.js';
import log from './log.js';
import { createMetricsRecorder } from './metrics.js';
import { UpstreamResolver } from './resolution/upstream-resolver.js';
import { ZoneResolver } from './resolution/zone-resolver.js';
import { RedirectDispatcher } from './routes/redirect/dispatcher.js';
import { FallbackPolicy } from './routes/redirect/fallback.js';
import type {
  MetricsRecorder,
  ProxyForwarder,
  RedirectConfig,
  TxtResolver,
} from './types.js';

/**
 * Wires the redirect components for a configuration. Collaborators that
 * leave the process can be swapped out.
 */
export function createDispatcher({
  log,
  config,
  txtResolver = new DnsTxtResolver({
    log,
    server: config.resolver,
    timeoutMs: config.dnsTimeoutMs,
  }),
  metrics = createMetricsRecorder({ enabled: config.metrics.enabled }),
  proxyForwarder = new AxiosProxyForwarder({
    log,
    requestTimeoutMs: config.proxyTimeoutMs,
  }),
}: {
  log: winston.Logger;
  config: RedirectConfig;
  txtResolver?: TxtResolver;
  metrics?: MetricsRecorder;
  proxyForwarder?: ProxyForwarder;
}): RedirectDispatcher {
  const zoneResolver = new ZoneResolver({
    log,
    txtResolver,
    enabledTypes: config.enabledTypes,
  });

  return new RedirectDispatcher({
    log,
    config,
    zoneResolver,
    upstreamResolver: new UpstreamResolver({ log, zoneResolver }),
    fallbackPolicy: new FallbackPolicy({ log, config, metrics }),
    metrics,
    proxyForwarder,
    dockerV2Handler: new DockerV2Redirector({ log }),
    goMetaRenderer: new GoMetaPageRenderer({ log }),
    goModsHandler: new GoModsRedirector({
      log,
      proxyUrl: config.gomods.proxyUrl,
    }),
  });
}

log.info('Redirect configuration loaded', {
  enabledTypes: [...config.ENABLED_TYPES],
  fallbackUrl: config.FALLBACK_REDIRECT_URL,
  dnsResolver: config.DNS_RESOLVER ?? 'system',
  metricsEnabled: config.METRICS_ENABLED,
});

export const dispatcher = createDispatcher({
  log,
  config: config.redirectConfig,
});
