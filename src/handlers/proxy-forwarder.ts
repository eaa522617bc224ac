/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as axios, AxiosInstance } from 'axios';
import { Response } from 'express';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import winston from 'winston';

import { headerNames } from '../constants.js';
import { stripPort } from '../lib/host-utils.js';
import { expandPlaceholders } from '../lib/placeholders.js';
import type {
  ProxyForwarder,
  RedirectRecord,
  RequestInfo,
} from '../types.js';

const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

// Connection scoped headers that must not be forwarded (RFC 9110 7.6.1)
const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
]);

const METHODS_WITHOUT_BODY = new Set(['GET', 'HEAD', 'OPTIONS']);

/**
 * Upstream URL for a proxied request. A target without a path receives the
 * request's path and query.
 *
 * @example
 * // GET /docs?page=2, to=https://upstream.example.com
 * proxyTarget(record, request) // 'https://upstream.example.com/docs?page=2'
 */
export function proxyTarget(
  record: RedirectRecord,
  request: RequestInfo,
): string {
  const url = new URL(expandPlaceholders(record.to ?? '', request));
  if (url.pathname === '/') {
    url.pathname = request.path;
    if (url.search === '') {
      url.search = request.query.toString();
    }
  }
  return url.toString();
}

export function forwardedHeaders(
  request: RequestInfo,
): Record<string, string | string[]> {
  const headers: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(request.headers)) {
    const lowerName = name.toLowerCase();
    if (
      value === undefined ||
      lowerName === 'host' ||
      HOP_BY_HOP_HEADERS.has(lowerName)
    ) {
      continue;
    }
    headers[lowerName] = value;
  }

  const forwardedFor = request.headers['x-forwarded-for'];
  const previousHops = Array.isArray(forwardedFor)
    ? forwardedFor.join(', ')
    : forwardedFor;
  if (request.remoteAddress !== undefined) {
    headers['x-forwarded-for'] =
      previousHops !== undefined && previousHops !== ''
        ? `${previousHops}, ${request.remoteAddress}`
        : request.remoteAddress;
  }
  headers['x-forwarded-host'] = request.host;
  headers['x-forwarded-proto'] = request.scheme;
  return headers;
}

export class AxiosProxyForwarder implements ProxyForwarder {
  private log: winston.Logger;
  private axios: AxiosInstance;

  constructor({
    log,
    requestTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
  }: {
    log: winston.Logger;
    requestTimeoutMs?: number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.axios = axios.create({
      timeout: requestTimeoutMs,
      maxRedirects: 0,
      decompress: false,
      validateStatus: () => true,
    });
  }

  async forward({
    res,
    request,
    record,
    signal,
  }: {
    res: Response;
    request: RequestInfo;
    record: RedirectRecord;
    signal?: AbortSignal;
  }): Promise<void> {
    const url = proxyTarget(record, request);
    const log = this.log.child({ method: 'forward', url });
    log.info('Proxying request', {
      host: stripPort(request.host),
      path: request.path,
    });

    const response = await this.axios.request<Readable>({
      method: request.method,
      url,
      headers: forwardedHeaders(request),
      data: METHODS_WITHOUT_BODY.has(request.method)
        ? undefined
        : request.body,
      responseType: 'stream',
      signal,
    });

    res.status(response.status);
    for (const [name, value] of Object.entries(response.headers)) {
      if (HOP_BY_HOP_HEADERS.has(name.toLowerCase())) {
        continue;
      }
      if (typeof value === 'string' || typeof value === 'number') {
        res.setHeader(name, value);
      } else if (Array.isArray(value)) {
        res.setHeader(name, value);
      }
    }
    res.setHeader(headerNames.statusCode, `${response.status}`);

    await pipeline(response.data, res);
    log.debug('Proxied response complete', { status: response.status });
  }
}
