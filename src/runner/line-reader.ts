/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { once } from 'node:events';
import readline from 'node:readline';

/**
 * Yields the lines of a text stream in order, tolerating CRLF endings.
 * Lines are passed through untouched; classification is up to the caller.
 */
export async function* readLines(input: NodeJS.ReadableStream): AsyncGenerator<string> {
  const rl = readline.createInterface({
    input,
    crlfDelay: Infinity,
  });
  try {
    for await (const line of rl) {
      yield line;
    }
  } finally {
    rl.close();
  }
}

/**
 * Writes one chunk, waiting for the sink to drain when its buffer is full.
 * Rejects if the sink emits 'error' while draining.
 */
export async function writeChunk(output: NodeJS.WritableStream, chunk: string): Promise<void> {
  if (!output.write(chunk)) {
    await once(output, 'drain');
  }
}
