/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Response } from 'express';
import winston from 'winston';

import { headerNames } from '../constants.js';
import type {
  DockerV2Handler,
  RedirectRecord,
  RequestInfo,
} from '../types.js';

const REGISTRY_API_VERSION = 'registry/2.0';
const REGISTRY_PATH_REGEX = /^\/v2\/(.+)\/(manifests|blobs|tags)\/(.+)$/;

interface ImageReference {
  name: string;
  tag?: string;
}

// 'org/image:tag' -> { name: 'org/image', tag: 'tag' }
function parseImage(path: string): ImageReference | undefined {
  const image = path.replace(/^\/+|\/+$/g, '');
  if (image === '') {
    return undefined;
  }
  const colon = image.lastIndexOf(':');
  if (colon === -1 || image.indexOf('/', colon) !== -1) {
    return { name: image };
  }
  return { name: image.slice(0, colon), tag: image.slice(colon + 1) };
}

/**
 * Location of a registry API request on the registry named by the record.
 * A record image pins the repository; when the record was reached through
 * use= the record image is a namespace for the requested repository.
 * Only the presence of the upstream zone matters here, its name is logged.
 */
export function registryLocation({
  path,
  record,
  upstreamZone,
}: {
  path: string;
  record: RedirectRecord;
  upstreamZone?: string;
}): string {
  const match = path.match(REGISTRY_PATH_REGEX);
  if (match === null) {
    throw new Error(`unsupported registry path: ${path}`);
  }
  const [, requestedName, kind, reference] = match;

  const target = new URL(record.to ?? '');
  const image = parseImage(decodeURIComponent(target.pathname));

  let name = requestedName;
  let ref = reference;
  if (image !== undefined) {
    if (upstreamZone !== undefined) {
      name = `${image.name}/${requestedName}`;
    } else {
      name = image.name;
      if (
        kind === 'manifests' &&
        reference === 'latest' &&
        image.tag !== undefined
      ) {
        ref = image.tag;
      }
    }
  }

  return `${target.protocol}//${target.host}/v2/${name}/${kind}/${ref}`;
}

export class DockerV2Redirector implements DockerV2Handler {
  private log: winston.Logger;

  constructor({ log }: { log: winston.Logger }) {
    this.log = log.child({ class: this.constructor.name });
  }

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
  }): void {
    // Version check endpoint, answered locally so clients keep talking to us
    if (request.path === '/v2' || request.path === '/v2/') {
      res.header(headerNames.dockerApiVersion, REGISTRY_API_VERSION);
      res.header(headerNames.statusCode, '200');
      res.status(200).json({});
      return;
    }

    const location = registryLocation({
      path: request.path,
      record,
      upstreamZone,
    });
    this.log.info('Redirecting registry request', {
      path: request.path,
      location,
      upstreamZone,
    });
    res.header(headerNames.dockerApiVersion, REGISTRY_API_VERSION);
    res.header(headerNames.statusCode, `${record.code}`);
    res.redirect(record.code, location);
  }
}
