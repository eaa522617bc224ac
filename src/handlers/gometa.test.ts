/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';
import express from 'express';
import request from 'supertest';

import { createRecord } from '../../test/records.js';
import { createTestLogger } from '../../test/test-logger.js';
import type { RedirectRecord } from '../types.js';
import { GoMetaPageRenderer, goImportPath, goMetaPage } from './gometa.js';

const log = createTestLogger({ suite: 'GoMetaPageRenderer' });

describe('goImportPath', () => {
  it('should join the host and path without port or trailing slash', () => {
    assert.equal(
      goImportPath('go.example.com:8080', '/tool/'),
      'go.example.com/tool',
    );
  });
});

describe('goMetaPage', () => {
  it('should render the go-import meta tag', () => {
    assert.equal(
      goMetaPage({
        importPath: 'go.example.com/tool',
        vcs: 'git',
        repository: 'https://git.example.com/tool',
      }),
      '<!DOCTYPE html>\n<html>\n<head>\n' +
        '<meta name="go-import" content="go.example.com/tool git https://git.example.com/tool">\n' +
        '</head>\n</html>\n',
    );
  });

  it('should add a refresh to the website and escape attributes', () => {
    const page = goMetaPage({
      importPath: 'go.example.com/tool',
      vcs: 'hg',
      repository: 'https://hg.example.com/tool?a=1&b=2',
      website: 'https://example.com/"docs"',
    });

    assert.ok(
      page.includes(
        '<meta name="go-import" content="go.example.com/tool hg https://hg.example.com/tool?a=1&amp;b=2">',
      ),
    );
    assert.ok(
      page.includes(
        '<meta http-equiv="refresh" content="0; url=https://example.com/&quot;docs&quot;">',
      ),
    );
  });
});

describe('GoMetaPageRenderer', () => {
  function createApp(record: RedirectRecord) {
    const renderer = new GoMetaPageRenderer({ log });
    const app = express();
    app.use((req, res) => {
      renderer.render({
        res,
        record,
        host: req.headers.host ?? '',
        path: req.path,
      });
    });
    return app;
  }

  it('should answer with the go-import page', async () => {
    const app = createApp(
      createRecord({ type: 'gometa', to: 'https://git.example.com/tool' }),
    );

    const res = await request(app)
      .get('/tool?go-get=1')
      .set('Host', 'go.example.com')
      .expect(200);

    assert.match(res.headers['content-type'], /^text\/html/);
    assert.equal(res.headers['status-code'], '200');
    assert.ok(
      res.text.includes(
        'content="go.example.com/tool git https://git.example.com/tool"',
      ),
    );
  });

  it('should use the record vcs', async () => {
    const app = createApp(
      createRecord({
        type: 'gometa',
        to: 'https://svn.example.com/tool',
        vcs: 'svn',
      }),
    );

    const res = await request(app)
      .get('/tool')
      .set('Host', 'go.example.com')
      .expect(200);

    assert.ok(
      res.text.includes(
        'content="go.example.com/tool svn https://svn.example.com/tool"',
      ),
    );
  });

  it('should refuse records without a repository', () => {
    const renderer = new GoMetaPageRenderer({ log });
    const app = express();
    let thrown: unknown;
    app.use((req, res) => {
      try {
        renderer.render({
          res,
          record: createRecord({ type: 'gometa' }),
          host: 'go.example.com',
          path: req.path,
        });
      } catch (error) {
        thrown = error;
        res.status(500).end();
      }
    });

    return request(app)
      .get('/tool')
      .expect(500)
      .then(() => {
        assert.ok(thrown instanceof Error);
        assert.equal(thrown.message, 'gometa record without to= repository');
      });
  });
});
