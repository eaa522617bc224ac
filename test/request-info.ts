/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { queryOf } from '../src/lib/http-utils.js';
import type { RequestInfo } from '../src/types.js';

/**
 * Request description for unit tests. The query is derived from the URI.
 *
 * @example
 * createRequestInfo({ host: 'example.com', uri: '/docs?page=2' })
 */
export function createRequestInfo({
  method = 'GET',
  scheme = 'https',
  host = 'example.com',
  uri = '/',
  headers = {},
  remoteAddress,
}: {
  method?: string;
  scheme?: string;
  host?: string;
  uri?: string;
  headers?: Record<string, string | string[] | undefined>;
  remoteAddress?: string;
} = {}): RequestInfo {
  const queryStart = uri.indexOf('?');
  return {
    method,
    scheme,
    host,
    path: queryStart === -1 ? uri : uri.slice(0, queryStart),
    uri,
    query: queryOf(uri),
    headers,
    remoteAddress,
  };
}
