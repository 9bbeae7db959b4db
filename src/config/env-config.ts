/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DEFAULT_CREATOR } from '../core/filter.js';

export type Env = Record<string, string | undefined>;

export interface NormalizerEnvConfig {
  strict: boolean;
  summary: boolean;
  warn: boolean;
}

export interface FilterEnvConfig {
  creator: string;
}

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export const isEnabled = (value: string | undefined): boolean =>
  value !== undefined && TRUTHY.has(value.trim().toLowerCase());

export function resolveNormalizerConfigFromEnv(env: Env = process.env): NormalizerEnvConfig {
  return {
    strict: isEnabled(env['RACE_NORMALIZE_STRICT']),
    summary: isEnabled(env['RACE_NORMALIZE_SUMMARY']),
    warn: isEnabled(env['RACE_NORMALIZE_WARN']),
  };
}

export function resolveFilterConfigFromEnv(env: Env = process.env): FilterEnvConfig {
  return {
    // Set-but-empty disables the creator rule, so only an unset variable falls back.
    creator: env['RACE_FILTER_CREATOR'] ?? DEFAULT_CREATOR,
  };
}
