/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { before, describe, it } from 'node:test';
import express, { Express } from 'express';
import request from 'supertest';

import { createRequestContextMiddleware } from './request-context.js';
import { createTestLogger } from '../../test/test-logger.js';

const log = createTestLogger({ suite: 'request-context' });

describe('createRequestContextMiddleware', () => {
  let app: Express;

  before(() => {
    app = express();
    app.use(createRequestContextMiddleware({ log }));
    app.get('/', (req, res) => {
      res.json({
        id: req.id,
        hasLog: req.log !== undefined,
        aborted: req.signal?.aborted,
      });
    });
  });

  it('should reuse an inbound request ID', async () => {
    const res = await request(app)
      .get('/')
      .set('X-Request-Id', 'test-request-id')
      .expect(200);

    assert.equal(res.headers['x-request-id'], 'test-request-id');
    assert.equal(res.body.id, 'test-request-id');
  });

  it('should generate a request ID when none is sent', async () => {
    const res = await request(app).get('/').expect(200);

    assert.match(res.headers['x-request-id'], /^[0-9a-f-]{36}$/);
    assert.equal(res.body.id, res.headers['x-request-id']);
  });

  it('should attach a logger and an unaborted signal', async () => {
    const res = await request(app).get('/').expect(200);

    assert.equal(res.body.hasLog, true);
    assert.equal(res.body.aborted, false);
  });
});
