/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { FilterEnvConfig } from '../config/env-config.js';
import { UsageError } from '../core/errors.js';
import { filterStream } from '../runner/index.js';
import type { FilterRunResult } from '../types/index.js';
import { parseArgs } from './args.js';
import type { CliIo, CliOutcome } from './io.js';

export const FILTER_PROGRAM = 'race-filter';

export async function runFilterCli(
  argv: readonly string[],
  io: CliIo,
  config: FilterEnvConfig,
): Promise<CliOutcome<FilterRunResult>> {
  try {
    parseArgs(FILTER_PROGRAM, argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr.write(`${error.message}\n`);
      return { exitCode: 1 };
    }
    throw error;
  }

  const result = await filterStream(io.stdin, io.stdout, { creator: config.creator });
  return { exitCode: 0, result };
}
