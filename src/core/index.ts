/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './errors.js';
export * from './scanner.js';
export * from './normalizer.js';
export * from './filter.js';
export * from './logging.js';
