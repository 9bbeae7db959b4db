/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types/index.js';
export * from './core/index.js';
export * from './runner/index.js';
export {
  resolveNormalizerConfigFromEnv,
  resolveFilterConfigFromEnv,
  type NormalizerEnvConfig,
  type FilterEnvConfig,
} from './config/env-config.js';
export { runNormalizeCli, NORMALIZE_PROGRAM } from './cli/normalize.js';
export { runFilterCli, FILTER_PROGRAM } from './cli/filter.js';
