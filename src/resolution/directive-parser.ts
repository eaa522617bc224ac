/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as winston from 'winston';

import {
  DEFAULT_STATUS_CODE,
  MAX_DIRECTIVE_LENGTH,
  PERMANENT_REDIRECT_STATUS,
  RECORD_TYPES,
  RECORD_ZONE_PREFIX,
  SUPPORTED_RECORD_VERSION,
} from '../constants.js';
import { RecordPolicyError, RecordSyntaxError } from '../lib/error.js';
import type {
  FallbackDirective,
  KnownRecordType,
  RecordType,
  RedirectRecord,
} from '../types.js';

// Unusable targets and flags are answered with a permanent global fallback
const PERMANENT_GLOBAL_FALLBACK: FallbackDirective = {
  mode: 'global',
  statusCode: PERMANENT_REDIRECT_STATUS,
};

const DIRECTIVES = new Set([
  'code',
  'from',
  're',
  'ref',
  'root',
  'to',
  'type',
  'use',
  'v',
  'vcs',
  'website',
]);

// RFC 9110 token and field-value characters
const HEADER_NAME_REGEX = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const HEADER_VALUE_REGEX = /^[\t\x20-\x7e\x80-\xff]*$/;

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

export interface ParseOptions {
  enabledTypes: ReadonlySet<KnownRecordType>;
  // Placeholder expansion applied to from=, root= and to=
  expand?: (template: string) => string;
  log?: winston.Logger;
}

export function toRecordType(name: string): RecordType {
  return RECORD_TYPES.find((type) => type === name) ?? 'unrecognized';
}

function parseBool(key: string, value: string): boolean {
  if (TRUE_VALUES.has(value)) {
    return true;
  }
  if (FALSE_VALUES.has(value)) {
    return false;
  }
  throw new RecordSyntaxError(`could not parse ${key} value: ${value}`, {
    fallback: PERMANENT_GLOBAL_FALLBACK,
  });
}

function parseStatusCode(value: string): number {
  if (!/^[+-]?\d+$/.test(value)) {
    throw new RecordSyntaxError(`could not parse status code: ${value}`);
  }
  return parseInt(value, 10);
}

function parseUri(key: string, value: string): string {
  try {
    // Relative references are valid targets
    new URL(value, 'http://relative.invalid');
  } catch (error) {
    throw new RecordSyntaxError(`invalid ${key} URI: ${value}`, {
      fallback: PERMANENT_GLOBAL_FALLBACK,
      cause: error,
    });
  }
  return value;
}

function parseHeader(segment: string): [string, string] {
  const separator = segment.indexOf('=');
  if (separator === -1) {
    throw new RecordSyntaxError(`header directive without value: ${segment}`);
  }
  const name = segment.slice(1, separator).trim();
  if (name === '') {
    throw new RecordSyntaxError(`header directive without name: ${segment}`);
  }
  if (!HEADER_NAME_REGEX.test(name)) {
    throw new RecordSyntaxError(`invalid header name: ${name}`);
  }
  let value: string;
  try {
    value = decodeURIComponent(segment.slice(separator + 1));
  } catch (error) {
    throw new RecordSyntaxError(`could not decode header ${name}`, {
      cause: error,
    });
  }
  if (!HEADER_VALUE_REGEX.test(value)) {
    throw new RecordSyntaxError(`invalid header value for ${name}`);
  }
  return [name, value];
}

function emptyRecord(): RedirectRecord {
  return {
    code: 0,
    typeName: '',
    use: [],
    ref: false,
    headers: {},
  };
}

/**
 * Parse a TXT record of ';' separated key=value directives.
 *
 * @example
 * parseRecord('v=txtv0;to=https://example.com;code=301', { enabledTypes })
 * // { type: 'host', to: 'https://example.com', code: 301, ... }
 */
export function parseRecord(
  text: string,
  { enabledTypes, expand = (template) => template, log }: ParseOptions,
): RedirectRecord {
  const record = emptyRecord();

  const segments = text.split(';').map((segment) => segment.trim());
  for (const segment of segments) {
    const separator = segment.indexOf('=');
    const key = separator === -1 ? segment : segment.slice(0, separator);
    const value = separator === -1 ? '' : segment.slice(separator + 1);

    const isHeader = segment.startsWith('>');
    if (!isHeader && (separator === -1 || !DIRECTIVES.has(key))) {
      // Unknown key=value pairs are tolerated, anything else is not
      if (segment.split('=').length !== 2) {
        throw new RecordSyntaxError('arbitrary data not allowed');
      }
      continue;
    }

    if (segment.length > MAX_DIRECTIVE_LENGTH) {
      throw new RecordSyntaxError(
        `TXT record cannot exceed the maximum of ${MAX_DIRECTIVE_LENGTH} characters`,
      );
    }

    if (isHeader) {
      const [name, headerValue] = parseHeader(segment);
      record.headers[name] = headerValue;
      continue;
    }

    switch (key) {
      case 'code':
        record.code = parseStatusCode(value);
        break;
      case 'from':
        record.from = expand(value);
        break;
      case 're':
        record.re = value;
        break;
      case 'ref':
        record.ref = parseBool(key, value);
        break;
      case 'root':
        record.root = parseUri(key, expand(value));
        break;
      case 'to':
        record.to = parseUri(key, expand(value));
        break;
      case 'type':
        record.typeName = value;
        record.type = toRecordType(value);
        break;
      case 'use':
        if (!value.startsWith(`${RECORD_ZONE_PREFIX}.`)) {
          throw new RecordSyntaxError(
            `the given zone address is invalid: ${value}`,
          );
        }
        record.use.push(value);
        break;
      case 'v':
        if (value !== SUPPORTED_RECORD_VERSION) {
          throw new RecordSyntaxError(`unhandled version '${value}'`);
        }
        record.version = value;
        log?.warn(
          `${SUPPORTED_RECORD_VERSION} is not suitable for production`,
        );
        break;
      case 'vcs':
        record.vcs = value;
        break;
      case 'website':
        record.website = parseUri(key, value);
        break;
    }
  }

  const hasTarget = record.to !== undefined && record.to !== '';

  if (record.type === 'dockerv2' && !hasTarget) {
    throw new RecordPolicyError('to= field is required in dockerv2 type');
  }

  if (record.code === 0) {
    record.code = DEFAULT_STATUS_CODE;
  }

  // Records pointing at upstream zones are validated once resolved
  if (record.use.length === 0) {
    if (record.type === undefined) {
      record.type = 'host';
      record.typeName = 'host';
    }

    if (record.type === 'host' && !hasTarget) {
      throw new RecordPolicyError('host record without to= target', {
        fallback: PERMANENT_GLOBAL_FALLBACK,
      });
    }

    if (record.type === 'unrecognized' || !enabledTypes.has(record.type)) {
      throw new RecordPolicyError(
        `${record.typeName} type is not enabled in configuration`,
      );
    }
  }

  return record;
}
