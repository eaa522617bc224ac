/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';
import log from '../src/log.js';

/**
 * Child of the main logger tagged with the suite and case under test. Under
 * the test runner the main logger writes to logs/test.log.
 *
 * @example
 * const log = createTestLogger({ suite: 'ZoneResolver' });
 */
export function createTestLogger({
  suite,
  test,
  metadata = {},
}: {
  suite?: string;
  test?: string;
  metadata?: Record<string, unknown>;
} = {}): winston.Logger {
  return log.child({
    ...metadata,
    ...(suite !== undefined && { testSuite: suite }),
    ...(test !== undefined && { testCase: test }),
  });
}
