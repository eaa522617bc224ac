/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { afterEach, describe, it } from 'node:test';

import {
  boolOrDefault,
  intOrDefault,
  listOrDefault,
  varOrDefault,
  varOrUndefined,
} from './env.js';

const TEST_VAR = 'TXT_REDIRECT_ENV_TEST';

describe('env', () => {
  afterEach(() => {
    delete process.env[TEST_VAR];
  });

  describe('varOrDefault', () => {
    it('should return the variable when set', () => {
      process.env[TEST_VAR] = 'value';
      assert.equal(varOrDefault(TEST_VAR, 'default'), 'value');
    });

    it('should return the default for unset or blank variables', () => {
      assert.equal(varOrDefault(TEST_VAR, 'default'), 'default');
      process.env[TEST_VAR] = '  ';
      assert.equal(varOrDefault(TEST_VAR, 'default'), 'default');
    });
  });

  describe('varOrUndefined', () => {
    it('should return undefined for blank variables', () => {
      process.env[TEST_VAR] = '';
      assert.equal(varOrUndefined(TEST_VAR), undefined);
    });
  });

  describe('boolOrDefault', () => {
    it('should parse true case insensitively', () => {
      process.env[TEST_VAR] = 'TRUE';
      assert.equal(boolOrDefault(TEST_VAR, false), true);
    });

    it('should treat other values as false', () => {
      process.env[TEST_VAR] = 'yes';
      assert.equal(boolOrDefault(TEST_VAR, true), false);
    });

    it('should return the default when unset', () => {
      assert.equal(boolOrDefault(TEST_VAR, true), true);
    });
  });

  describe('intOrDefault', () => {
    it('should parse integers', () => {
      process.env[TEST_VAR] = '9183';
      assert.equal(intOrDefault(TEST_VAR, 1), 9183);
    });

    it('should return the default when unset', () => {
      assert.equal(intOrDefault(TEST_VAR, 5000), 5000);
    });

    it('should reject non integer values', () => {
      process.env[TEST_VAR] = '1.5';
      assert.throws(() => intOrDefault(TEST_VAR, 1), {
        message: `${TEST_VAR} must be a non-negative integer: 1.5`,
      });
    });

    it('should reject negative values', () => {
      process.env[TEST_VAR] = '-1';
      assert.throws(() => intOrDefault(TEST_VAR, 1), /non-negative integer/);
    });
  });

  describe('listOrDefault', () => {
    it('should split on commas and drop empty entries', () => {
      process.env[TEST_VAR] = 'host, path,,gometa ';
      assert.deepEqual(listOrDefault(TEST_VAR, []), ['host', 'path', 'gometa']);
    });

    it('should return the default when unset', () => {
      assert.deepEqual(listOrDefault(TEST_VAR, ['host']), ['host']);
    });
  });
});
