/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export const headerNames = {
  server: 'Server',
  statusCode: 'Status-Code',
  cacheControl: 'Cache-Control',
  referer: 'Referer',
  dockerApiVersion: 'Docker-Distribution-API-Version',
  requestId: 'X-Request-Id',
};

export const SERVER_NAME = 'txt-redirect';

// Every TXT record lives below this label, e.g. _redirect.example.com.
export const RECORD_ZONE_PREFIX = '_redirect';
export const WILDCARD_LABEL = '_';

export const SUPPORTED_RECORD_VERSION = 'txtv0';

// Single character-string limit of a TXT record
export const MAX_DIRECTIVE_LENGTH = 255;

export const DEFAULT_STATUS_CODE = 302;
export const PERMANENT_REDIRECT_STATUS = 301;
export const PERMANENT_REDIRECT_MAX_AGE_SECONDS = 604800;

export const RECORD_TYPES = [
  'host',
  'path',
  'proxy',
  'dockerv2',
  'gometa',
  'gomods',
] as const;

export const DEFAULT_ENABLED_TYPES = ['host', 'path', 'gometa'];

export const BLACKLISTED_PATHS = new Set(['/favicon.ico']);

export const MAX_UPSTREAM_HOPS = 4;

export const DOCKER_CLIENT_USER_AGENT = 'Docker-Client';
export const GO_GET_QUERY_PARAM = 'go-get';
export const DEFAULT_VCS = 'git';
