/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Response } from 'express';
import winston from 'winston';

import {
  BLACKLISTED_PATHS,
  DOCKER_CLIENT_USER_AGENT,
  GO_GET_QUERY_PARAM,
  PERMANENT_REDIRECT_MAX_AGE_SECONDS,
  PERMANENT_REDIRECT_STATUS,
  SERVER_NAME,
  headerNames,
} from '../../constants.js';
import {
  RecordPolicyError,
  TypeHandlerError,
  UnsupportedTypeError,
  errorMessage,
  fallbackFor,
} from '../../lib/error.js';
import { isIpHost, stripPort } from '../../lib/host-utils.js';
import { expandPlaceholders } from '../../lib/placeholders.js';
import { zoneFromPath } from '../../resolution/path-zone.js';
import { UpstreamResolver } from '../../resolution/upstream-resolver.js';
import {
  ZoneResolver,
  createResolutionContext,
} from '../../resolution/zone-resolver.js';
import type {
  DockerV2Handler,
  FallbackDirective,
  GoMetaRenderer,
  GoModsHandler,
  KnownRecordType,
  MetricsRecorder,
  ProxyForwarder,
  RedirectConfig,
  RedirectRecord,
  RequestInfo,
  ResolutionContext,
} from '../../types.js';
import { FallbackPolicy, sendNotFound } from './fallback.js';

interface DispatchState {
  request: RequestInfo;
  res: Response;
  context: ResolutionContext;
  log: winston.Logger;
  signal?: AbortSignal;
}

/**
 * Turns a request into a response using the redirect records found in DNS.
 * Every failure ends in exactly one fallback response written here.
 */
export class RedirectDispatcher {
  private log: winston.Logger;
  private config: Pick<RedirectConfig, 'enabledTypes'>;
  private zoneResolver: ZoneResolver;
  private upstreamResolver: UpstreamResolver;
  private fallbackPolicy: FallbackPolicy;
  private metrics: MetricsRecorder;
  private proxyForwarder: ProxyForwarder;
  private dockerV2Handler: DockerV2Handler;
  private goMetaRenderer: GoMetaRenderer;
  private goModsHandler: GoModsHandler;

  constructor({
    log,
    config,
    zoneResolver,
    upstreamResolver,
    fallbackPolicy,
    metrics,
    proxyForwarder,
    dockerV2Handler,
    goMetaRenderer,
    goModsHandler,
  }: {
    log: winston.Logger;
    config: Pick<RedirectConfig, 'enabledTypes'>;
    zoneResolver: ZoneResolver;
    upstreamResolver: UpstreamResolver;
    fallbackPolicy: FallbackPolicy;
    metrics: MetricsRecorder;
    proxyForwarder: ProxyForwarder;
    dockerV2Handler: DockerV2Handler;
    goMetaRenderer: GoMetaRenderer;
    goModsHandler: GoModsHandler;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.config = config;
    this.zoneResolver = zoneResolver;
    this.upstreamResolver = upstreamResolver;
    this.fallbackPolicy = fallbackPolicy;
    this.metrics = metrics;
    this.proxyForwarder = proxyForwarder;
    this.dockerV2Handler = dockerV2Handler;
    this.goMetaRenderer = goMetaRenderer;
    this.goModsHandler = goModsHandler;
  }

  async dispatch({
    request,
    res,
    signal,
  }: {
    request: RequestInfo;
    res: Response;
    signal?: AbortSignal;
  }): Promise<void> {
    const host = stripPort(request.host);
    const log = this.log.child({
      method: 'dispatch',
      requestId: request.id,
      host: request.host,
      path: request.path,
    });
    const state: DispatchState = {
      request,
      res,
      context: createResolutionContext(),
      log,
      signal,
    };

    res.header(headerNames.server, SERVER_NAME);

    if (BLACKLISTED_PATHS.has(request.path)) {
      log.info('Blacklisted path requested');
      this.metrics.count('requestsByStatus', { host, status: '404' });
      sendNotFound(res);
      return;
    }

    if (isIpHost(request.host)) {
      log.info('Request addressed to an IP, fallback triggered');
      this.fallback(state, {
        mode: 'global',
        statusCode: PERMANENT_REDIRECT_STATUS,
      });
      return;
    }

    try {
      const record = await this.resolveRecord(state, request.host);
      await this.route(state, record);
    } catch (error) {
      if (signal?.aborted === true) {
        log.info('Request aborted by client', { error: errorMessage(error) });
        return;
      }
      log.warn('Fallback is triggered because an error has occurred', {
        error: errorMessage(error),
        errorType: error instanceof Error ? error.name : typeof error,
      });
      this.fallback(state, fallbackFor(error));
    }
  }

  private fallback(state: DispatchState, directive: FallbackDirective) {
    this.applyRecordHeaders(state);
    this.fallbackPolicy.apply({
      res: state.res,
      request: state.request,
      context: state.context,
      mode: directive.mode,
      statusCode: directive.statusCode,
    });
  }

  // Headers from every record resolved so far, later records win
  private applyRecordHeaders({ res, context, log }: DispatchState) {
    if (res.headersSent) {
      return;
    }
    for (const [name, value] of Object.entries(context.headers)) {
      try {
        res.header(name, value);
      } catch (error) {
        log.warn('Skipping record header rejected by the transport', {
          header: name,
          error: errorMessage(error),
        });
      }
    }
  }

  private async resolveRecord(
    state: DispatchState,
    host: string,
  ): Promise<RedirectRecord> {
    const { request, context, signal } = state;
    const apex = await this.zoneResolver.resolve({
      host,
      request,
      context,
      signal,
    });
    const { record } = await this.upstreamResolver.resolve({
      record: apex,
      request,
      context,
      signal,
    });
    this.applyRecordHeaders(state);
    return record;
  }

  private validate(record: RedirectRecord): KnownRecordType {
    if (
      record.from !== undefined &&
      record.from !== '' &&
      record.re !== undefined &&
      record.re !== ''
    ) {
      throw new RecordPolicyError(
        "it's not allowed to use both re= and from= in a record",
        { fallback: { mode: 'to', statusCode: record.code } },
      );
    }

    const type = record.type ?? 'unrecognized';
    if (type === 'unrecognized') {
      throw new UnsupportedTypeError(
        `record type ${record.typeName} unsupported`,
      );
    }
    if (!this.config.enabledTypes.has(type)) {
      throw new RecordPolicyError('option disabled', { type });
    }
    return type;
  }

  private async route(
    state: DispatchState,
    record: RedirectRecord,
  ): Promise<void> {
    const type = this.validate(record);
    this.metrics.count('requestsByType', {
      host: stripPort(state.request.host),
      type,
    });

    switch (type) {
      case 'host':
        this.redirectHost(state, record);
        return;
      case 'path':
        await this.redirectPath(state, record);
        return;
      case 'proxy':
        await this.proxy(state, record);
        return;
      case 'dockerv2':
        this.redirectDockerV2(state, record);
        return;
      case 'gometa':
        this.renderGoMeta(state, record);
        return;
      case 'gomods':
        this.handleGoMods(state, record);
        return;
      default: {
        const unsupported: never = type;
        throw new UnsupportedTypeError(`record type ${unsupported} unsupported`);
      }
    }
  }

  private redirect(
    { request, res, log }: DispatchState,
    location: string,
    statusCode: number,
  ) {
    log.info('Redirecting', {
      from: `${request.host}${request.path}`,
      to: location,
      status: statusCode,
    });
    if (statusCode === PERMANENT_REDIRECT_STATUS) {
      res.header(
        headerNames.cacheControl,
        `max-age=${PERMANENT_REDIRECT_MAX_AGE_SECONDS}`,
      );
    }
    res.header(headerNames.statusCode, `${statusCode}`);
    res.redirect(statusCode, location);
    this.metrics.count('requestsByStatus', {
      host: stripPort(request.host),
      status: `${statusCode}`,
    });
  }

  private redirectHost(state: DispatchState, record: RedirectRecord) {
    const location = expandPlaceholders(record.to ?? '', state.request, {
      values: { remainder: state.context.pathRemainder ?? '' },
    });
    if (record.ref) {
      state.res.header(headerNames.referer, state.request.host);
    }
    this.redirect(state, location, record.code);
  }

  private async redirectPath(state: DispatchState, record: RedirectRecord) {
    const { request, context } = state;
    const toFallback: FallbackDirective = {
      mode: 'to',
      statusCode: record.code,
    };
    this.metrics.count('pathRedirects', {
      host: stripPort(request.host),
      path: request.path,
    });

    if (request.path === '/') {
      if (record.root === undefined || record.root === '') {
        throw new RecordPolicyError('path record without root= target', {
          fallback: toFallback,
        });
      }
      this.redirect(state, record.root, record.code);
      return;
    }

    const { zone, remainder } = zoneFromPath({
      host: request.host,
      path: request.path,
      from: record.from,
      re: record.re,
      fallback: toFallback,
    });
    context.pathRemainder = remainder;

    let finalRecord: RedirectRecord;
    try {
      finalRecord = await this.resolveRecord(state, zone);
    } catch (error) {
      throw new TypeHandlerError(
        `could not resolve path record at ${zone}: ${errorMessage(error)}`,
        { fallback: toFallback, cause: error },
      );
    }
    state.log.debug('Resolved path record', {
      zone,
      remainder,
      type: finalRecord.typeName,
    });

    if (finalRecord.type === 'path') {
      throw new RecordPolicyError(
        'path records cannot resolve to another path record',
        { fallback: toFallback },
      );
    }
    try {
      this.validate(finalRecord);
    } catch (error) {
      throw new RecordPolicyError(
        `path record at ${zone} is not usable: ${errorMessage(error)}`,
        { fallback: toFallback, cause: error },
      );
    }

    await this.route(state, finalRecord);
  }

  private async proxy(state: DispatchState, record: RedirectRecord) {
    const { request, res, signal } = state;
    try {
      await this.proxyForwarder.forward({ res, request, record, signal });
    } catch (error) {
      throw new TypeHandlerError(`proxy request failed: ${errorMessage(error)}`, {
        fallback: { mode: 'to', statusCode: record.code },
        cause: error,
      });
    }
    this.metrics.count('requestsByStatus', {
      host: stripPort(request.host),
      status: `${res.statusCode}`,
    });
  }

  private redirectDockerV2(state: DispatchState, record: RedirectRecord) {
    const { request, res, context } = state;
    const toFallback: FallbackDirective = {
      mode: 'to',
      statusCode: record.code,
    };

    const userAgent = request.headers['user-agent'];
    const agents = Array.isArray(userAgent) ? userAgent : [userAgent ?? ''];
    if (!agents.some((agent) => agent.includes(DOCKER_CLIENT_USER_AGENT))) {
      throw new TypeHandlerError('the request is not from a docker client', {
        fallback: toFallback,
      });
    }

    try {
      this.dockerV2Handler.handle({
        res,
        request,
        record,
        upstreamZone: context.upstreamZone,
      });
    } catch (error) {
      throw new TypeHandlerError(
        `couldn't redirect to the requested container: ${errorMessage(error)}`,
        { fallback: toFallback, cause: error },
      );
    }
    this.metrics.count('requestsByStatus', {
      host: stripPort(request.host),
      status: `${res.statusCode}`,
    });
  }

  private renderGoMeta(state: DispatchState, record: RedirectRecord) {
    const { request, res } = state;
    const websiteFallback: FallbackDirective = {
      mode: 'website',
      statusCode: 302,
    };

    if (request.query.get(GO_GET_QUERY_PARAM) !== '1') {
      throw new TypeHandlerError('not a go-get request', {
        fallback: websiteFallback,
      });
    }

    try {
      this.goMetaRenderer.render({
        res,
        record,
        host: request.host,
        path: request.path,
      });
    } catch (error) {
      throw new TypeHandlerError(
        `couldn't render go-import page: ${errorMessage(error)}`,
        { fallback: websiteFallback, cause: error },
      );
    }
    this.metrics.count('requestsByStatus', {
      host: stripPort(request.host),
      status: '200',
    });
  }

  private handleGoMods(state: DispatchState, record: RedirectRecord) {
    const { request, res } = state;
    try {
      this.goModsHandler.handle({ res, path: request.path });
    } catch (error) {
      throw new TypeHandlerError(
        `couldn't serve module request: ${errorMessage(error)}`,
        { fallback: { mode: 'global', statusCode: record.code }, cause: error },
      );
    }
    this.metrics.count('requestsByStatus', {
      host: stripPort(request.host),
      status: `${res.statusCode}`,
    });
  }
}
