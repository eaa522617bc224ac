/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { DnsResolutionError, errorMessage } from '../lib/error.js';
import {
  absoluteZone,
  apexWildcardHost,
  wildcardHost,
} from '../lib/host-utils.js';
import { expandPlaceholders } from '../lib/placeholders.js';
import type {
  KnownRecordType,
  RedirectRecord,
  RequestInfo,
  ResolutionContext,
  TxtResolver,
} from '../types.js';
import { parseRecord } from './directive-parser.js';

export function createResolutionContext(): ResolutionContext {
  return { records: [], headers: {} };
}

/**
 * Finds and parses the redirect record for a host. Lookups go to the apex
 * zone first, then the apex wildcard (_.host) for the first record of a
 * request, then the wildcard replacing the leftmost label.
 */
export class ZoneResolver {
  private log: winston.Logger;
  private txtResolver: TxtResolver;
  private enabledTypes: ReadonlySet<KnownRecordType>;

  constructor({
    log,
    txtResolver,
    enabledTypes,
  }: {
    log: winston.Logger;
    txtResolver: TxtResolver;
    enabledTypes: ReadonlySet<KnownRecordType>;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.txtResolver = txtResolver;
    this.enabledTypes = enabledTypes;
  }

  private async query(
    host: string,
    signal?: AbortSignal,
  ): Promise<string[]> {
    const zone = absoluteZone(host);
    try {
      return await this.txtResolver.resolveTxt({ zone, signal });
    } catch (error) {
      throw new DnsResolutionError(
        `could not get TXT record for ${zone}: ${errorMessage(error)}`,
        { zone, cause: error },
      );
    }
  }

  private async lookup({
    host,
    context,
    signal,
  }: {
    host: string;
    context: ResolutionContext;
    signal?: AbortSignal;
  }): Promise<string[]> {
    const log = this.log.child({ method: 'lookup', host });

    let txts: string[] | undefined;
    try {
      txts = await this.query(host, signal);
    } catch (error) {
      log.debug('Apex zone DNS query failed', { error: errorMessage(error) });
    }

    // Sub-zone lookups made later in the request skip the apex wildcard
    if (txts === undefined && context.records.length === 0) {
      try {
        txts = await this.query(apexWildcardHost(host), signal);
      } catch (error) {
        log.debug('Apex wildcard DNS query failed', {
          error: errorMessage(error),
        });
      }
    }

    if (txts === undefined || txts[0] === '') {
      try {
        txts = await this.query(wildcardHost(host), signal);
      } catch (error) {
        log.warn('Wildcard DNS query failed', { error: errorMessage(error) });
        throw error;
      }
    }

    return txts;
  }

  async resolve({
    host,
    request,
    context,
    signal,
  }: {
    host: string;
    request: RequestInfo;
    context: ResolutionContext;
    signal?: AbortSignal;
  }): Promise<RedirectRecord> {
    const txts = await this.lookup({ host, context, signal });

    if (txts.length !== 1) {
      throw new DnsResolutionError(
        `could not parse TXT record with ${txts.length} records`,
        { host },
      );
    }

    const record = parseRecord(txts[0], {
      enabledTypes: this.enabledTypes,
      expand: (template) => expandPlaceholders(template, request),
      log: this.log,
    });

    context.records.push(record);
    Object.assign(context.headers, record.headers);

    this.log.debug('Resolved record', { host, type: record.typeName });
    return record;
  }
}
