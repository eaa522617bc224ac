/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Response } from 'express';
import winston from 'winston';

import { DEFAULT_VCS, headerNames } from '../constants.js';
import { stripPort } from '../lib/host-utils.js';
import type { GoMetaRenderer, RedirectRecord } from '../types.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char]);
}

export function goImportPath(host: string, path: string): string {
  return `${stripPort(host)}${path}`.replace(/\/+$/, '');
}

export function goMetaPage({
  importPath,
  vcs,
  repository,
  website,
}: {
  importPath: string;
  vcs: string;
  repository: string;
  website?: string;
}): string {
  const refresh =
    website !== undefined && website !== ''
      ? `\n<meta http-equiv="refresh" content="0; url=${escapeHtml(website)}">`
      : '';
  return `<!DOCTYPE html>
<html>
<head>
<meta name="go-import" content="${escapeHtml(`${importPath} ${vcs} ${repository}`)}">${refresh}
</head>
</html>
`;
}

export class GoMetaPageRenderer implements GoMetaRenderer {
  private log: winston.Logger;

  constructor({ log }: { log: winston.Logger }) {
    this.log = log.child({ class: this.constructor.name });
  }

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
  }): void {
    if (record.to === undefined || record.to === '') {
      throw new Error('gometa record without to= repository');
    }
    const importPath = goImportPath(host, path);
    const vcs =
      record.vcs !== undefined && record.vcs !== '' ? record.vcs : DEFAULT_VCS;

    this.log.info('Rendering go-import page', {
      importPath,
      vcs,
      repository: record.to,
    });
    res.header(headerNames.statusCode, '200');
    res
      .status(200)
      .type('html')
      .send(
        goMetaPage({
          importPath,
          vcs,
          repository: record.to,
          website: record.website,
        }),
      );
  }
}
