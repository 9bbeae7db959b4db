/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { RecordFilter, type RecordFilterOptions } from '../core/filter.js';
import type { FilterRunResult } from '../types/index.js';
import { readLines, writeChunk } from './line-reader.js';

/**
 * Copies normalized records from `input` to `output`, dropping the ones
 * {@link RecordFilter} rejects. Blank lines are skipped.
 */
export async function filterStream(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  options: RecordFilterOptions = {},
): Promise<FilterRunResult> {
  const filter = new RecordFilter(options);
  const result: FilterRunResult = {
    recordsRead: 0,
    recordsKept: 0,
    dropped: {
      'restore-failure': 0,
      'fmt-package': 0,
      'finished-goroutine': 0,
      'foreign-creator': 0,
    },
  };

  for await (const line of readLines(input)) {
    if (line.length === 0) {
      continue;
    }
    result.recordsRead += 1;
    const reason = filter.classify(line);
    if (reason) {
      result.dropped[reason] += 1;
      continue;
    }
    await writeChunk(output, `${line}\n`);
    result.recordsKept += 1;
  }

  return result;
}
