/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { isIP } from 'node:net';

import { RECORD_ZONE_PREFIX, WILDCARD_LABEL } from '../constants.js';

/**
 * Remove the port from a Host header value. Bracketed IPv6 literals keep
 * their address without the brackets.
 */
export function stripPort(host: string): string {
  if (host.startsWith('[')) {
    const end = host.indexOf(']');
    return end === -1 ? host.slice(1) : host.slice(1, end);
  }
  // Unbracketed IPv6 literals have no port
  if (host.split(':').length > 2) {
    return host;
  }
  const colon = host.indexOf(':');
  return colon === -1 ? host : host.slice(0, colon);
}

/**
 * Check whether a Host header names an IP address rather than a DNS name.
 * Hosts whose last label is numeric are treated as addresses as well since
 * no top level domain is numeric.
 */
export function isIpHost(host: string): boolean {
  if (host.startsWith('[') || host.split(':').length > 2) {
    return true;
  }
  const hostname = stripPort(host).replace(/\.$/, '');
  if (isIP(hostname) !== 0) {
    return true;
  }
  const labels = hostname.split('.');
  return /^\d+$/.test(labels[labels.length - 1]);
}

/**
 * Fully qualified TXT record name for a host or zone.
 *
 * @example
 * absoluteZone('example.com:8080') // '_redirect.example.com.'
 * absoluteZone('_redirect.upstream.example.com') // '_redirect.upstream.example.com.'
 */
export function absoluteZone(zone: string): string {
  let name = stripPort(zone);
  if (!name.startsWith(`${RECORD_ZONE_PREFIX}.`)) {
    name = `${RECORD_ZONE_PREFIX}.${name}`;
  }
  return name.endsWith('.') ? name : `${name}.`;
}

export function apexWildcardHost(host: string): string {
  return `${WILDCARD_LABEL}.${host}`;
}

// Replaces the leftmost label, a.b.c -> _.b.c
export function wildcardHost(host: string): string {
  const labels = host.split('.');
  labels[0] = WILDCARD_LABEL;
  return labels.join('.');
}

// Zone name without its first label, _redirect.a.b -> a.b
export function parentZone(zone: string): string {
  return zone.split('.').slice(1).join('.');
}
