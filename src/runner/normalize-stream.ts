/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { RaceReportScanner } from '../core/scanner.js';
import { formatRecord, normalizeReport } from '../core/normalizer.js';
import { ReportGrammarError, TruncatedReportError } from '../core/errors.js';
import type { NormalizeObserver, NormalizeRunResult, NormalizedReport } from '../types/index.js';
import { readLines, writeChunk } from './line-reader.js';

export interface NormalizeStreamOptions {
  /** Fail instead of dropping a report cut off by the end of input. */
  strict?: boolean;
  observer?: NormalizeObserver;
}

/**
 * Reads race detector output from `input` and writes one canonical record per
 * complete report to `output` as soon as the report's closing marker is seen.
 *
 * Rejects with {@link ReportGrammarError} on the first malformed report; records
 * written before it remain in `output`.
 */
export async function normalizeStream(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  options: NormalizeStreamOptions = {},
): Promise<NormalizeRunResult> {
  const scanner = new RaceReportScanner();
  const { observer } = options;
  let linesRead = 0;
  let recordsEmitted = 0;

  for await (const line of readLines(input)) {
    linesRead += 1;
    const block = scanner.push(line);
    if (!block) {
      continue;
    }
    let report: NormalizedReport;
    try {
      report = normalizeReport(block.fields);
    } catch (error) {
      if (error instanceof ReportGrammarError) {
        throw error.withBlockNumber(block.blockNumber);
      }
      throw error;
    }
    await writeChunk(output, formatRecord(report));
    recordsEmitted += 1;
    observer?.onRecord?.({ blockNumber: block.blockNumber, report });
  }

  const truncated = scanner.finish();
  if (truncated) {
    if (options.strict) {
      throw new TruncatedReportError(truncated.blockNumber, truncated.fieldCount);
    }
    observer?.onTruncatedBlock?.(truncated);
  }

  return {
    linesRead,
    blocksOpened: scanner.blockCount,
    recordsEmitted,
    truncated,
  };
}
