/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { MAX_UPSTREAM_HOPS } from '../constants.js';
import { UpstreamExhaustedError, errorMessage } from '../lib/error.js';
import { parentZone } from '../lib/host-utils.js';
import type {
  RedirectRecord,
  RequestInfo,
  ResolutionContext,
} from '../types.js';
import { ZoneResolver } from './zone-resolver.js';

export class UpstreamResolver {
  private log: winston.Logger;
  private zoneResolver: ZoneResolver;
  private maxHops: number;

  constructor({
    log,
    zoneResolver,
    maxHops = MAX_UPSTREAM_HOPS,
  }: {
    log: winston.Logger;
    zoneResolver: ZoneResolver;
    maxHops?: number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.zoneResolver = zoneResolver;
    this.maxHops = maxHops;
  }

  // First zone that resolves wins, later zones are never queried
  private async resolveFirst({
    zones,
    visited,
    request,
    context,
    signal,
  }: {
    zones: string[];
    visited: Set<string>;
    request: RequestInfo;
    context: ResolutionContext;
    signal?: AbortSignal;
  }): Promise<{ record: RedirectRecord; zone: string }> {
    for (const zone of zones) {
      if (visited.has(zone)) {
        this.log.warn('Skipping upstream zone already in chain', { zone });
        continue;
      }
      visited.add(zone);

      try {
        const record = await this.zoneResolver.resolve({
          host: zone,
          request,
          context,
          signal,
        });
        return { record, zone };
      } catch (error) {
        this.log.debug('Upstream zone failed', {
          zone,
          error: errorMessage(error),
        });
      }
    }

    throw new UpstreamExhaustedError(
      "couldn't find any records from upstream",
      { zones },
    );
  }

  /**
   * Replace a record carrying use= directives with the record found in its
   * upstream zones. Records without use= are returned unchanged.
   */
  async resolve({
    record,
    request,
    context,
    signal,
  }: {
    record: RedirectRecord;
    request: RequestInfo;
    context: ResolutionContext;
    signal?: AbortSignal;
  }): Promise<{ record: RedirectRecord; zone?: string }> {
    let current = record;
    let zone: string | undefined;
    const visited = new Set<string>();

    for (let hop = 0; current.use.length > 0; hop++) {
      if (hop === this.maxHops) {
        throw new UpstreamExhaustedError(
          `upstream chain exceeds ${this.maxHops} hops`,
        );
      }
      const resolved = await this.resolveFirst({
        zones: current.use,
        visited,
        request,
        context,
        signal,
      });
      current = resolved.record;
      zone = resolved.zone;
      context.upstreamZone = parentZone(zone);
      this.log.debug('Resolved upstream record', { zone, hop });
    }

    return { record: current, zone };
  }
}
