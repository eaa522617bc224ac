/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { DEFAULT_STATUS_CODE } from '../constants.js';
import type { FallbackDirective } from '../types.js';

interface DetailedErrorOptions {
  stack?: string;
  cause?: unknown;
  [key: string]: unknown;
}

export class DetailedError extends Error {
  constructor(message: string, options?: DetailedErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    Object.assign(this, options);
    this.stack = options?.stack ?? new Error().stack;
  }

  toJSON(): {
    message: string;
    stack: string | undefined;
    [key: string]: unknown;
  } {
    const { name, message, ...rest } = this;
    return {
      message: this.message,
      stack: this.stack,
      ...rest,
    };
  }
}

const GLOBAL_FALLBACK: FallbackDirective = {
  mode: 'global',
  statusCode: DEFAULT_STATUS_CODE,
};

/**
 * Base of every failure raised while resolving or dispatching a request.
 * Each carries the fallback the dispatcher must answer with.
 */
export class RedirectError extends DetailedError {
  readonly fallback: FallbackDirective;

  constructor(
    message: string,
    {
      fallback = GLOBAL_FALLBACK,
      ...options
    }: DetailedErrorOptions & { fallback?: FallbackDirective } = {},
  ) {
    super(message, options);
    this.fallback = fallback;
  }
}

export class DnsResolutionError extends RedirectError {}

export class RecordSyntaxError extends RedirectError {}

export class RecordPolicyError extends RedirectError {}

export class UpstreamExhaustedError extends RedirectError {}

export class PathMatchError extends RedirectError {}

export class TypeHandlerError extends RedirectError {}

export class UnsupportedTypeError extends RedirectError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function fallbackFor(error: unknown): FallbackDirective {
  return error instanceof RedirectError ? error.fallback : GLOBAL_FALLBACK;
}
