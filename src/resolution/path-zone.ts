/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { PathMatchError, errorMessage } from '../lib/error.js';
import { stripPort } from '../lib/host-utils.js';
import type { FallbackDirective } from '../types.js';

const LABEL_REGEX = /^[a-z0-9_-]{1,63}$/;
const TEMPLATE_VARIABLE_REGEX = /^\$(\d+)$/;

export interface PathZone {
  zone: string;
  remainder: string;
}

function splitPath(path: string): string[] {
  return path.split('/').filter((segment) => segment !== '');
}

function fromTemplate(
  segments: string[],
  template: string,
): { labels: string[]; consumed: number } {
  const templateSegments = splitPath(template);
  if (templateSegments.length > segments.length) {
    throw new Error(`path is shorter than from=${template}`);
  }

  const captures: { index: number; value: string }[] = [];
  templateSegments.forEach((templateSegment, position) => {
    const variable = templateSegment.match(TEMPLATE_VARIABLE_REGEX);
    if (variable !== null) {
      captures.push({ index: +variable[1], value: segments[position] });
    } else if (templateSegment !== segments[position]) {
      throw new Error(
        `path segment ${segments[position]} does not match ${templateSegment}`,
      );
    }
  });

  return {
    labels: captures
      .sort((a, b) => a.index - b.index)
      .map(({ value }) => value),
    consumed: templateSegments.length,
  };
}

function fromExpression(
  path: string,
  expression: string,
): { labels: string[]; remainder: string } {
  const match = new RegExp(expression).exec(path);
  if (match === null) {
    throw new Error(`path does not match re=${expression}`);
  }
  const groups = match
    .slice(1)
    .filter((group): group is string => group !== undefined);
  const captured = groups.length > 0 ? groups : [match[0]];
  return {
    labels: captured.flatMap(splitPath),
    remainder: path.slice(match.index + match[0].length),
  };
}

/**
 * Derive the sub-zone queried for a path record.
 *
 * @example
 * zoneFromPath({ host: 'example.com', path: '/docs/intro' })
 * // { zone: 'docs.example.com', remainder: '/intro' }
 * zoneFromPath({ host: 'example.com', path: '/a/b', from: '/$1/$2' })
 * // { zone: 'b.a.example.com', remainder: '' }
 */
export function zoneFromPath({
  host,
  path,
  from,
  re,
  fallback,
}: {
  host: string;
  path: string;
  from?: string;
  re?: string;
  fallback: FallbackDirective;
}): PathZone {
  let labels: string[];
  let remainder: string;
  try {
    const segments = splitPath(path);
    if (re !== undefined && re !== '') {
      ({ labels, remainder } = fromExpression(path, re));
    } else if (from !== undefined && from !== '') {
      const { labels: captured, consumed } = fromTemplate(segments, from);
      labels = captured;
      remainder = segments
        .slice(consumed)
        .map((segment) => `/${segment}`)
        .join('');
    } else {
      labels = segments.slice(0, 1);
      remainder = segments
        .slice(1)
        .map((segment) => `/${segment}`)
        .join('');
    }
  } catch (error) {
    throw new PathMatchError(errorMessage(error), { path, fallback });
  }

  const normalized = labels.map((label) => label.toLowerCase());
  if (normalized.length === 0) {
    throw new PathMatchError('no zone labels found in path', {
      path,
      fallback,
    });
  }
  const invalid = normalized.find((label) => !LABEL_REGEX.test(label));
  if (invalid !== undefined) {
    throw new PathMatchError(`invalid zone label: ${invalid}`, {
      path,
      fallback,
    });
  }

  return {
    zone: [...normalized.reverse(), stripPort(host)].join('.'),
    remainder,
  };
}
