/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Response } from 'express';
import winston from 'winston';

import { headerNames } from '../constants.js';
import type { GoModsHandler } from '../types.js';

// Endpoints of the module proxy protocol (go help goproxy)
const MODULE_PROXY_PATH_REGEX =
  /^\/(.+)\/(@v\/list|@v\/[^/]+\.(info|mod|zip)|@latest)$/;

const MODULE_PROXY_STATUS = 302;

export function isModuleProxyPath(path: string): boolean {
  return MODULE_PROXY_PATH_REGEX.test(path);
}

/**
 * Answers module proxy requests by redirecting them to an upstream module
 * proxy.
 */
export class GoModsRedirector implements GoModsHandler {
  private log: winston.Logger;
  private proxyUrl: URL;

  constructor({ log, proxyUrl }: { log: winston.Logger; proxyUrl: string }) {
    this.log = log.child({ class: this.constructor.name });
    this.proxyUrl = new URL(proxyUrl);
  }

  location(path: string): string {
    const base = this.proxyUrl.toString().replace(/\/+$/, '');
    return `${base}${path}`;
  }

  handle({ res, path }: { res: Response; path: string }): void {
    if (!isModuleProxyPath(path)) {
      throw new Error(`not a module proxy path: ${path}`);
    }
    const location = this.location(path);
    this.log.info('Redirecting module request', { path, location });
    res.header(headerNames.statusCode, `${MODULE_PROXY_STATUS}`);
    res.redirect(MODULE_PROXY_STATUS, location);
  }
}
