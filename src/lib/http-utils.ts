/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Request } from 'express';

import type { RequestInfo } from '../types.js';

// Only used to split the query string off request targets
const PLACEHOLDER_ORIGIN = 'http://request.invalid';

/**
 * Returns the first value of a possibly repeated header.
 *
 * @example
 * firstHeaderValue(['a', 'b']) // 'a'
 * firstHeaderValue(undefined) // undefined
 */
export function firstHeaderValue(
  value: string | string[] | undefined,
): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function queryOf(uri: string): URLSearchParams {
  const queryStart = uri.indexOf('?');
  if (queryStart === -1) {
    return new URLSearchParams();
  }
  return new URL(uri.slice(queryStart), PLACEHOLDER_ORIGIN).searchParams;
}

export function requestInfoFromExpress(req: Request): RequestInfo {
  return {
    id: req.id,
    method: req.method,
    scheme: req.protocol,
    host: firstHeaderValue(req.headers.host) ?? req.hostname,
    path: req.path,
    uri: req.originalUrl,
    query: queryOf(req.originalUrl),
    headers: req.headers,
    remoteAddress: req.socket.remoteAddress,
    body: req,
  };
}
