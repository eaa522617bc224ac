/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import {
  DnsResolutionError,
  RecordPolicyError,
  errorMessage,
  fallbackFor,
} from './error.js';

describe('error', () => {
  describe('RedirectError', () => {
    it('should default to a global fallback', () => {
      const error = new DnsResolutionError('lookup failed');
      assert.deepEqual(error.fallback, { mode: 'global', statusCode: 302 });
      assert.equal(error.name, 'DnsResolutionError');
    });

    it('should carry details and the given fallback', () => {
      const error = new RecordPolicyError('no target', {
        fallback: { mode: 'to', statusCode: 301 },
        zone: '_redirect.example.com.',
      });
      assert.deepEqual(error.fallback, { mode: 'to', statusCode: 301 });
      assert.equal(error.toJSON().zone, '_redirect.example.com.');
    });
  });

  describe('fallbackFor', () => {
    it('should use the fallback of redirect errors', () => {
      const error = new RecordPolicyError('disabled', {
        fallback: { mode: 'website', statusCode: 302 },
      });
      assert.deepEqual(fallbackFor(error), { mode: 'website', statusCode: 302 });
    });

    it('should fall back globally for other errors', () => {
      assert.deepEqual(fallbackFor(new TypeError('boom')), {
        mode: 'global',
        statusCode: 302,
      });
    });
  });

  describe('errorMessage', () => {
    it('should read messages from errors and stringify other values', () => {
      assert.equal(errorMessage(new Error('boom')), 'boom');
      assert.equal(errorMessage('plain'), 'plain');
    });
  });
});
