/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as env from './lib/env.js';
import { DEFAULT_ENABLED_TYPES, RECORD_TYPES } from './constants.js';
import type { KnownRecordType, RedirectConfig } from './types.js';

//
// HTTP server
//

export const PORT = env.intOrDefault('PORT', 8080);

//
// Record types
//

export function parseEnabledTypes(names: string[]): Set<KnownRecordType> {
  const enabled = new Set<KnownRecordType>();
  for (const name of names) {
    const type = RECORD_TYPES.find((known) => known === name);
    if (type === undefined) {
      throw new Error(`Unknown record type in ENABLED_TYPES: ${name}`);
    }
    enabled.add(type);
  }
  return enabled;
}

// Record types served by this instance (comma-separated)
export const ENABLED_TYPES = parseEnabledTypes(
  env.listOrDefault('ENABLED_TYPES', DEFAULT_ENABLED_TYPES),
);

//
// Fallback
//

export function validateUrl(name: string, url: string): string {
  try {
    new URL(url);
  } catch (error) {
    throw new Error(`Invalid URL in ${name}: ${url}`);
  }
  return url;
}

// Where requests go when nothing more specific can be resolved. Without it
// failed requests get a 404.
const FALLBACK_REDIRECT_URL_STRING = env.varOrUndefined(
  'FALLBACK_REDIRECT_URL',
);
export const FALLBACK_REDIRECT_URL =
  FALLBACK_REDIRECT_URL_STRING !== undefined
    ? validateUrl('FALLBACK_REDIRECT_URL', FALLBACK_REDIRECT_URL_STRING)
    : undefined;

//
// DNS
//

// Nameserver used for TXT lookups ("host" or "host:port"). The system
// resolver is used when unset.
export const DNS_RESOLVER = env.varOrUndefined('DNS_RESOLVER');

export const DNS_TIMEOUT_MS = env.intOrDefault('DNS_TIMEOUT_MS', 5000);

//
// Proxy
//

export const PROXY_TIMEOUT_MS = env.intOrDefault('PROXY_TIMEOUT_MS', 30000);

//
// Go modules
//

export const GOMODS_PROXY_URL = validateUrl(
  'GOMODS_PROXY_URL',
  env.varOrDefault('GOMODS_PROXY_URL', 'https://proxy.golang.org'),
);

//
// Metrics
//

export const METRICS_ENABLED = env.boolOrDefault('METRICS_ENABLED', false);
export const METRICS_PORT = env.intOrDefault('METRICS_PORT', 9183);
export const METRICS_PATH = env.varOrDefault('METRICS_PATH', '/metrics');

export const redirectConfig: RedirectConfig = Object.freeze({
  enabledTypes: ENABLED_TYPES,
  fallbackUrl: FALLBACK_REDIRECT_URL,
  resolver: DNS_RESOLVER,
  dnsTimeoutMs: DNS_TIMEOUT_MS,
  proxyTimeoutMs: PROXY_TIMEOUT_MS,
  gomods: Object.freeze({ proxyUrl: GOMODS_PROXY_URL }),
  metrics: Object.freeze({
    enabled: METRICS_ENABLED,
    port: METRICS_PORT,
    path: METRICS_PATH,
  }),
});
