/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { Readable } from 'node:stream';
import type { Response } from 'express';

import type { RECORD_TYPES } from './constants.js';

export type KnownRecordType = (typeof RECORD_TYPES)[number];

export type RecordType = KnownRecordType | 'unrecognized';

export interface RedirectRecord {
  version?: string;
  to?: string;
  root?: string;
  website?: string;
  code: number;
  // Unset only while the record points at upstream zones through use=
  type?: RecordType;
  typeName: string;
  use: string[];
  vcs?: string;
  from?: string;
  re?: string;
  ref: boolean;
  headers: Record<string, string>;
}

/**
 * Everything resolved while handling a single request. Created by the
 * dispatcher and passed explicitly through every resolution call.
 */
export interface ResolutionContext {
  records: RedirectRecord[];
  headers: Record<string, string>;
  upstreamZone?: string;
  pathRemainder?: string;
}

export type FallbackMode = 'global' | 'to' | 'website';

export interface FallbackDirective {
  mode: FallbackMode;
  statusCode: number;
}

/**
 * Transport independent view of the inbound request.
 */
export interface RequestInfo {
  id?: string;
  method: string;
  scheme: string;
  host: string;
  path: string;
  // Path plus query string, as received
  uri: string;
  query: URLSearchParams;
  headers: Record<string, string | string[] | undefined>;
  remoteAddress?: string;
  body?: Readable;
}

export interface GomodsConfig {
  proxyUrl: string;
}

export interface MetricsConfig {
  enabled: boolean;
  port: number;
  path: string;
}

export interface RedirectConfig {
  enabledTypes: ReadonlySet<KnownRecordType>;
  fallbackUrl?: string;
  resolver?: string;
  dnsTimeoutMs: number;
  proxyTimeoutMs: number;
  gomods: GomodsConfig;
  metrics: MetricsConfig;
}

export interface TxtResolver {
  resolveTxt({
    zone,
    signal,
  }: {
    zone: string;
    signal?: AbortSignal;
  }): Promise<string[]>;
}

export interface MetricLabels {
  requestsByType: { host: string; type: string };
  requestsByStatus: { host: string; status: string };
  pathRedirects: { host: string; path: string };
  fallbacks: { host: string; mode: FallbackMode };
}

export type MetricKind = keyof MetricLabels;

export interface MetricsRecorder {
  count<K extends MetricKind>(kind: K, labels: MetricLabels[K]): void;
}

export interface ProxyForwarder {
  forward({
    res,
    request,
    record,
    signal,
  }: {
    res: Response;
    request: RequestInfo;
    record: RedirectRecord;
    signal?: AbortSignal;
  }): Promise<void>;
}

export interface DockerV2Handler {
  handle({
    res,
    request,
    record,
    upstreamZone,
  }: {
    res: Response;
    request: RequestInfo;
    record: RedirectRecord;
    upstreamZone?: string;
  }): void;
}

export interface GoMetaRenderer {
  render({
    res,
    record,
    host,
    path,
  }: {
    res: Response;
    record: RedirectRecord;
    host: string;
    path: string;
  }): void;
}

export interface GoModsHandler {
  handle({ res, path }: { res: Response; path: string }): void;
}
