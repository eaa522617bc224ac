/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { promises as dns } from 'node:dns';
import * as winston from 'winston';

import type { TxtResolver } from '../types.js';

export interface TxtLookupClient {
  setServers(servers: string[]): void;
  resolveTxt(hostname: string): Promise<string[][]>;
  cancel(): void;
}

export type TxtLookupClientFactory = (options: {
  timeout: number;
}) => TxtLookupClient;

const DEFAULT_LOOKUP_TIMEOUT_MS = 5000;

const defaultClientFactory: TxtLookupClientFactory = ({ timeout }) =>
  new dns.Resolver({ timeout, tries: 2 });

/**
 * TXT lookups through node:dns. A resolver instance is created per lookup so
 * that cancelling one request never interrupts another.
 */
export class DnsTxtResolver implements TxtResolver {
  private log: winston.Logger;
  private servers: string[] | undefined;
  private timeoutMs: number;
  private createClient: TxtLookupClientFactory;

  constructor({
    log,
    server,
    timeoutMs = DEFAULT_LOOKUP_TIMEOUT_MS,
    createClient = defaultClientFactory,
  }: {
    log: winston.Logger;
    server?: string;
    timeoutMs?: number;
    createClient?: TxtLookupClientFactory;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.servers = server !== undefined ? [server] : undefined;
    this.timeoutMs = timeoutMs;
    this.createClient = createClient;
  }

  async resolveTxt({
    zone,
    signal,
  }: {
    zone: string;
    signal?: AbortSignal;
  }): Promise<string[]> {
    signal?.throwIfAborted();

    const client = this.createClient({ timeout: this.timeoutMs });
    if (this.servers !== undefined) {
      client.setServers(this.servers);
    }

    const onAbort = () => client.cancel();
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      this.log.debug('Looking up TXT record', { zone });
      const records = await client.resolveTxt(zone);

      // Long TXT values arrive split into 255 byte character-strings
      const txts = records.map((chunks) => chunks.join(''));
      if (txts.length === 0) {
        throw new Error(`No TXT records found for ${zone}`);
      }
      return txts;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
