/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export function varOrDefault(envVarName: string, defaultValue: string): string {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== '' ? value : defaultValue;
}

export function varOrUndefined(envVarName: string): string | undefined {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

export function boolOrDefault(envVarName: string, defaultValue: boolean) {
  return varOrDefault(envVarName, `${defaultValue}`).toLowerCase() === 'true';
}

export function intOrDefault(envVarName: string, defaultValue: number): number {
  const raw = varOrDefault(envVarName, `${defaultValue}`);
  const value = +raw;
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${envVarName} must be a non-negative integer: ${raw}`);
  }
  return value;
}

// Comma separated list, empty entries dropped
export function listOrDefault(
  envVarName: string,
  defaultValue: string[],
): string[] {
  const value = varOrUndefined(envVarName);
  if (value === undefined) {
    return defaultValue;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}
