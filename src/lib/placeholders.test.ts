/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { createRequestInfo } from '../../test/request-info.js';
import { expandPlaceholders, hasPlaceholders } from './placeholders.js';

describe('placeholders', () => {
  const request = createRequestInfo({
    scheme: 'https',
    host: 'docs.example.com:8443',
    uri: '/guide/intro.html?lang=en&v=2',
    headers: { 'user-agent': 'test-agent', accept: ['text/html', '*/*'] },
  });

  describe('hasPlaceholders', () => {
    it('should detect braces', () => {
      assert.equal(hasPlaceholders('https://{host}/'), true);
      assert.equal(hasPlaceholders('https://example.com/'), false);
    });
  });

  describe('expandPlaceholders', () => {
    it('should expand host placeholders', () => {
      assert.equal(
        expandPlaceholders('{host}|{hostonly}|{port}', request),
        'docs.example.com:8443|docs.example.com|8443',
      );
    });

    it('should default the port from the scheme', () => {
      const plain = createRequestInfo({ scheme: 'http', host: 'example.com' });
      assert.equal(expandPlaceholders('{port}', plain), '80');
      const secure = createRequestInfo({ scheme: 'https', host: 'example.com' });
      assert.equal(expandPlaceholders('{port}', secure), '443');
    });

    it('should expand request line placeholders', () => {
      assert.equal(
        expandPlaceholders('{scheme} {method} {path} {query} {uri}', request),
        'https GET /guide/intro.html lang=en&v=2 /guide/intro.html?lang=en&v=2',
      );
    });

    it('should expand escaped placeholders', () => {
      assert.equal(
        expandPlaceholders('{path_escaped}', request),
        '%2Fguide%2Fintro.html',
      );
      assert.equal(
        expandPlaceholders('{query_escaped}', request),
        'lang%3Den%26v%3D2',
      );
    });

    it('should split the path into dir and file', () => {
      assert.equal(
        expandPlaceholders('{dir}|{file}', request),
        '/guide/|intro.html',
      );
    });

    it('should treat a trailing slash as a directory', () => {
      const dir = createRequestInfo({ uri: '/guide/' });
      assert.equal(expandPlaceholders('{dir}|{file}', dir), '/guide/|');
    });

    it('should expand host labels', () => {
      assert.equal(
        expandPlaceholders('{label1}.{label2}.{label3}.{label4}', request),
        'docs.example.com.',
      );
    });

    it('should expand headers and query parameters', () => {
      assert.equal(
        expandPlaceholders('{>User-Agent}|{>Accept}|{?lang}|{?missing}', request),
        'test-agent|text/html, */*|en|',
      );
    });

    it('should keep unknown placeholders', () => {
      assert.equal(
        expandPlaceholders('https://example.org/{remainder}', request),
        'https://example.org/{remainder}',
      );
    });

    it('should prefer supplied values', () => {
      assert.equal(
        expandPlaceholders('https://example.org{remainder}', request, {
          values: { remainder: '/intro' },
        }),
        'https://example.org/intro',
      );
    });

    it('should keep excluded placeholders', () => {
      assert.equal(
        expandPlaceholders('{host}{path}', request, { exclude: ['path'] }),
        'docs.example.com:8443{path}',
      );
    });
  });
});
