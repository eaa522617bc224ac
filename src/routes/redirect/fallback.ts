/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Response } from 'express';
import winston from 'winston';

import { DEFAULT_STATUS_CODE, headerNames } from '../../constants.js';
import { stripPort } from '../../lib/host-utils.js';
import type {
  FallbackMode,
  MetricsRecorder,
  RedirectConfig,
  RequestInfo,
  ResolutionContext,
} from '../../types.js';

export const sendNotFound = (res: Response) => {
  res.header(headerNames.statusCode, '404');
  res.status(404).type('text/plain').send('404 page not found');
};

function redirectStatus(statusCode: number): number {
  return statusCode >= 300 && statusCode < 400
    ? statusCode
    : DEFAULT_STATUS_CODE;
}

/**
 * Produces the response for requests that could not be resolved or
 * dispatched. The most specific target available wins: the latest record's
 * to=, then its website=, then the configured fallback URL, then a 404.
 */
export class FallbackPolicy {
  private log: winston.Logger;
  private config: Pick<RedirectConfig, 'fallbackUrl'>;
  private metrics: MetricsRecorder;

  constructor({
    log,
    config,
    metrics,
  }: {
    log: winston.Logger;
    config: Pick<RedirectConfig, 'fallbackUrl'>;
    metrics: MetricsRecorder;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.config = config;
    this.metrics = metrics;
  }

  private target(
    mode: FallbackMode,
    context: ResolutionContext,
  ): { mode: FallbackMode; location?: string } {
    const latest = context.records[context.records.length - 1];
    if (mode === 'to' && latest?.to !== undefined && latest.to !== '') {
      return { mode, location: latest.to };
    }
    if (
      mode !== 'global' &&
      latest?.website !== undefined &&
      latest.website !== ''
    ) {
      return { mode: 'website', location: latest.website };
    }
    return { mode: 'global', location: this.config.fallbackUrl };
  }

  /**
   * Write the fallback response. Returns false when a response was already
   * committed and nothing could be written.
   */
  apply({
    res,
    request,
    context,
    mode,
    statusCode,
  }: {
    res: Response;
    request: RequestInfo;
    context: ResolutionContext;
    mode: FallbackMode;
    statusCode: number;
  }): boolean {
    const log = this.log.child({ method: 'apply', host: request.host });
    const host = stripPort(request.host);

    if (res.headersSent) {
      log.warn('Response already committed, fallback skipped', { mode });
      return false;
    }

    const target = this.target(mode, context);
    this.metrics.count('fallbacks', { host, mode: target.mode });

    if (target.location === undefined) {
      log.info('Fallback triggered without target', { requestedMode: mode });
      this.metrics.count('requestsByStatus', { host, status: '404' });
      sendNotFound(res);
      return true;
    }

    const status = redirectStatus(statusCode);
    log.info('Fallback triggered', {
      requestedMode: mode,
      mode: target.mode,
      location: target.location,
      status,
    });
    this.metrics.count('requestsByStatus', { host, status: `${status}` });
    res.header(headerNames.statusCode, `${status}`);
    res.redirect(status, target.location);
    return true;
  }
}
