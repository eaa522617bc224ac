/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { RedirectRecord } from '../src/types.js';

export function createRecord(
  overrides: Partial<RedirectRecord> = {},
): RedirectRecord {
  return {
    code: 302,
    type: 'host',
    typeName: overrides.type ?? 'host',
    use: [],
    ref: false,
    headers: {},
    ...overrides,
  };
}
