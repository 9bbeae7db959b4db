#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolveNormalizerConfigFromEnv } from '../config/env-config.js';
import { NORMALIZE_PROGRAM, runNormalizeCli } from '../cli/normalize.js';
import { exitOnOutputError } from '../cli/output-errors.js';
import { renderSummaryIfEnabled } from '../ui/normalize-summary.js';

const main = async (): Promise<number> => {
  exitOnOutputError(process.stdout, NORMALIZE_PROGRAM);
  const config = resolveNormalizerConfigFromEnv();
  const { exitCode, result } = await runNormalizeCli(
    process.argv.slice(2),
    { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr },
    config,
  );
  await renderSummaryIfEnabled(result, config.summary);
  return exitCode;
};

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((error) => {
    console.error(`[${NORMALIZE_PROGRAM}] failed:`, error);
    process.exit(1);
  });
