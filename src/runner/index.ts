/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export { normalizeStream, type NormalizeStreamOptions } from './normalize-stream.js';
export { filterStream } from './filter-stream.js';
export { readLines, writeChunk } from './line-reader.js';
