/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as promClient from 'prom-client';

import type {
  MetricKind,
  MetricLabels,
  MetricsRecorder,
} from './types.js';

export const registry = new promClient.Registry();

//
// Redirect metrics
//

export const requestsByTypeCounter = new promClient.Counter({
  name: 'redirect_requests_by_type_total',
  help: 'Count of requests per host and record type',
  labelNames: ['host', 'type'],
  registers: [registry],
});

export const requestsByStatusCounter = new promClient.Counter({
  name: 'redirect_requests_by_status_total',
  help: 'Count of responses per host and status code',
  labelNames: ['host', 'status'],
  registers: [registry],
});

export const pathRedirectsCounter = new promClient.Counter({
  name: 'redirect_path_requests_total',
  help: 'Count of path record requests per host and path',
  labelNames: ['host', 'path'],
  registers: [registry],
});

export const fallbacksCounter = new promClient.Counter({
  name: 'redirect_fallbacks_total',
  help: 'Count of fallback responses per host and fallback mode',
  labelNames: ['host', 'mode'],
  registers: [registry],
});

const counters: Record<MetricKind, promClient.Counter<string>> = {
  requestsByType: requestsByTypeCounter,
  requestsByStatus: requestsByStatusCounter,
  pathRedirects: pathRedirectsCounter,
  fallbacks: fallbacksCounter,
};

export class PrometheusMetricsRecorder implements MetricsRecorder {
  count<K extends MetricKind>(kind: K, labels: MetricLabels[K]): void {
    const values: Record<string, string> = labels;
    counters[kind].inc(values);
  }
}

export class NoopMetricsRecorder implements MetricsRecorder {
  count<K extends MetricKind>(_kind: K, _labels: MetricLabels[K]): void {
    // disabled
  }
}

export function createMetricsRecorder({
  enabled,
}: {
  enabled: boolean;
}): MetricsRecorder {
  if (enabled) {
    promClient.collectDefaultMetrics({ register: registry });
    return new PrometheusMetricsRecorder();
  }
  return new NoopMetricsRecorder();
}
