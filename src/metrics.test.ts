/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';
import * as promClient from 'prom-client';
import request from 'supertest';

import {
  NoopMetricsRecorder,
  PrometheusMetricsRecorder,
  fallbacksCounter,
  registry,
  requestsByTypeCounter,
} from './metrics.js';
import { createMetricsApp } from './metrics-server.js';

async function counterValue(
  counter: promClient.Counter<string>,
  labels: Record<string, string>,
): Promise<number> {
  const { values } = await counter.get();
  const match = values.find((value) =>
    Object.entries(labels).every(
      ([name, expected]) => value.labels[name] === expected,
    ),
  );
  return match?.value ?? 0;
}

describe('PrometheusMetricsRecorder', () => {
  it('should increment the counter for the metric kind', async () => {
    const recorder = new PrometheusMetricsRecorder();
    const labels = { host: 'metrics.example.com', type: 'host' };
    const before = await counterValue(requestsByTypeCounter, labels);

    recorder.count('requestsByType', labels);
    recorder.count('requestsByType', labels);

    assert.equal(await counterValue(requestsByTypeCounter, labels), before + 2);
  });

  it('should label fallbacks by mode', async () => {
    const recorder = new PrometheusMetricsRecorder();
    const labels = { host: 'metrics.example.com', mode: 'website' };
    const before = await counterValue(fallbacksCounter, labels);

    recorder.count('fallbacks', { host: 'metrics.example.com', mode: 'website' });

    assert.equal(await counterValue(fallbacksCounter, labels), before + 1);
  });
});

describe('NoopMetricsRecorder', () => {
  it('should not touch the registry', async () => {
    const labels = { host: 'noop.example.com', type: 'host' };

    new NoopMetricsRecorder().count('requestsByType', labels);

    assert.equal(await counterValue(requestsByTypeCounter, labels), 0);
  });
});

describe('createMetricsApp', () => {
  it('should expose the registry at the configured path', async () => {
    new PrometheusMetricsRecorder().count('pathRedirects', {
      host: 'metrics.example.com',
      path: '/docs',
    });
    const app = createMetricsApp({ registry, path: '/metrics' });

    const res = await request(app).get('/metrics').expect(200);

    assert.match(res.headers['content-type'], /^text\/plain/);
    assert.ok(
      res.text
        .split('\n')
        .includes(
          'redirect_path_requests_total{host="metrics.example.com",path="/docs"} 1',
        ),
    );
  });

  it('should not serve other paths', async () => {
    const app = createMetricsApp({ registry, path: '/metrics' });

    await request(app).get('/other').expect(404);
  });
});
