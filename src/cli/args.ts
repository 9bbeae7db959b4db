/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { UsageError } from '../core/errors.js';

/**
 * Both executables read stdin and write stdout only, so any argument is a usage error.
 */
export const parseArgs = (program: string, argv: readonly string[]): void => {
  if (argv.length !== 0) {
    throw new UsageError(program);
  }
};
