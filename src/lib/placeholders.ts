/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { posix } from 'node:path';

import type { RequestInfo } from '../types.js';
import { stripPort } from './host-utils.js';

const PLACEHOLDER_REGEX = /\{([^{}\s]+)\}/g;

export function hasPlaceholders(template: string): boolean {
  return /[{}]/.test(template);
}

function headerValue(request: RequestInfo, name: string): string {
  const value = request.headers[name.toLowerCase()];
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  return value ?? '';
}

function portOf(request: RequestInfo): string {
  const match = request.host.match(/^(?:\[[^\]]*\]|[^:]*):(\d+)$/);
  if (match !== null) {
    return match[1];
  }
  return request.scheme === 'https' ? '443' : '80';
}

function replacement(
  token: string,
  request: RequestInfo,
): string | undefined {
  if (token.startsWith('>')) {
    return headerValue(request, token.slice(1));
  }
  if (token.startsWith('?')) {
    return request.query.get(token.slice(1)) ?? '';
  }

  const label = token.match(/^label(\d+)$/);
  if (label !== null) {
    const labels = stripPort(request.host).split('.');
    return labels[+label[1] - 1] ?? '';
  }

  const query = request.query.toString();
  switch (token) {
    case 'host':
      return request.host;
    case 'hostonly':
      return stripPort(request.host);
    case 'port':
      return portOf(request);
    case 'scheme':
      return request.scheme;
    case 'method':
      return request.method;
    case 'path':
      return request.path;
    case 'path_escaped':
      return encodeURIComponent(request.path);
    case 'dir':
      return request.path.endsWith('/')
        ? request.path
        : `${posix.dirname(request.path).replace(/\/$/, '')}/`;
    case 'file':
      return request.path.endsWith('/') ? '' : posix.basename(request.path);
    case 'query':
      return query;
    case 'query_escaped':
      return encodeURIComponent(query);
    case 'uri':
      return request.uri;
    case 'uri_escaped':
      return encodeURIComponent(request.uri);
    default:
      return undefined;
  }
}

/**
 * Substitute request placeholders such as {host}, {path} or {label1} in a
 * template. Unknown or excluded placeholders are kept as written.
 *
 * @example
 * // GET https://example.test/docs?page=2
 * expandPlaceholders('https://{hostonly}/new{path}', request)
 * // 'https://example.test/new/docs'
 */
export function expandPlaceholders(
  template: string,
  request: RequestInfo,
  {
    exclude = [],
    values = {},
  }: { exclude?: string[]; values?: Record<string, string> } = {},
): string {
  if (!hasPlaceholders(template)) {
    return template;
  }
  return template.replace(PLACEHOLDER_REGEX, (placeholder, token: string) => {
    if (exclude.includes(token)) {
      return placeholder;
    }
    const value = Object.prototype.hasOwnProperty.call(values, token)
      ? values[token]
      : replacement(token, request);
    return value ?? placeholder;
  });
}
