/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { NormalizerEnvConfig } from '../config/env-config.js';
import { ReportGrammarError, TruncatedReportError, UsageError } from '../core/errors.js';
import { ConsoleLogger } from '../core/logging.js';
import { normalizeStream } from '../runner/index.js';
import type { NormalizeRunResult } from '../types/index.js';
import { parseArgs } from './args.js';
import type { CliIo, CliOutcome } from './io.js';

export const NORMALIZE_PROGRAM = 'race-normalize';

export async function runNormalizeCli(
  argv: readonly string[],
  io: CliIo,
  config: Pick<NormalizerEnvConfig, 'strict' | 'warn'>,
): Promise<CliOutcome<NormalizeRunResult>> {
  try {
    parseArgs(NORMALIZE_PROGRAM, argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr.write(`${error.message}\n`);
      return { exitCode: 1 };
    }
    throw error;
  }

  const logger = new ConsoleLogger(NORMALIZE_PROGRAM, io.stderr, !config.warn);

  try {
    const result = await normalizeStream(io.stdin, io.stdout, {
      strict: config.strict,
      observer: {
        onTruncatedBlock: (info) =>
          logger.warn('dropped truncated race report', [
            ['block', info.blockNumber],
            ['fields', info.fieldCount],
          ]),
      },
    });
    return { exitCode: 0, result };
  } catch (error) {
    if (error instanceof ReportGrammarError) {
      logger.error('malformed race report', [
        ['reason', error.message],
        ['block', error.blockNumber],
        ['fields', error.fields.length],
        ['first', error.fields[0]],
      ]);
      return { exitCode: 1 };
    }
    if (error instanceof TruncatedReportError) {
      logger.error('truncated race report', [
        ['block', error.blockNumber],
        ['fields', error.fieldCount],
      ]);
      return { exitCode: 1 };
    }
    throw error;
  }
}
