#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolveFilterConfigFromEnv } from '../config/env-config.js';
import { FILTER_PROGRAM, runFilterCli } from '../cli/filter.js';
import { exitOnOutputError } from '../cli/output-errors.js';

exitOnOutputError(process.stdout, FILTER_PROGRAM);

runFilterCli(
  process.argv.slice(2),
  { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr },
  resolveFilterConfigFromEnv(),
)
  .then(({ exitCode }) => process.exit(exitCode))
  .catch((error) => {
    console.error(`[${FILTER_PROGRAM}] failed:`, error);
    process.exit(1);
  });
