/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ConsoleLogger, type LogSink } from '../core/logging.js';

/**
 * Ends the process with status 1 when the record stream fails, e.g. EPIPE once
 * the reading side of a pipe has gone away.
 */
export function exitOnOutputError(
  output: NodeJS.WritableStream,
  program: string,
  stderr: LogSink = process.stderr,
  exit: (code: number) => void = (code) => process.exit(code),
): void {
  output.on('error', (error: NodeJS.ErrnoException) => {
    new ConsoleLogger(program, stderr).error('output stream failed', [
      ['reason', error.message],
      ['code', error.code],
    ]);
    exit(1);
  });
}
