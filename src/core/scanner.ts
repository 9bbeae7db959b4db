/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CompletedBlock, ScannerState, TruncatedBlock } from '../types/index.js';

export const BOUNDARY_PATTERN = /^=+$/;
export const RACE_WARNING_LINE = 'WARNING: DATA RACE';

/**
 * Groups detector output into race report blocks.
 *
 * Blocks open and close on lines made only of `=`. Inside a block, blank lines
 * separate fields and every other line is appended to the current field with a
 * single space, so wrapped stack traces collapse to one string per field.
 */
export class RaceReportScanner {
  private mode: ScannerState = 'outside-block';
  private fields: string[] = [];
  private field = '';
  private blocksOpened = 0;

  get state(): ScannerState {
    return this.mode;
  }

  get blockCount(): number {
    return this.blocksOpened;
  }

  /**
   * Feeds one raw line. Returns the block's fields when this line closed it.
   */
  push(rawLine: string): CompletedBlock | undefined {
    const line = rawLine.trim();
    const isBoundary = BOUNDARY_PATTERN.test(line);

    if (this.mode === 'outside-block') {
      if (isBoundary) {
        this.fields = [];
        this.field = '';
        this.blocksOpened += 1;
        this.mode = 'inside-block';
      }
      return undefined;
    }

    if (isBoundary) {
      this.fields.push(this.field);
      const completed: CompletedBlock = { blockNumber: this.blocksOpened, fields: this.fields };
      this.fields = [];
      this.field = '';
      this.mode = 'outside-block';
      return completed;
    }

    if (line === RACE_WARNING_LINE) {
      return undefined;
    }

    if (line === '') {
      this.fields.push(this.field);
      this.field = '';
      return undefined;
    }

    this.field = this.field === '' ? line : `${this.field} ${line}`;
    return undefined;
  }

  /**
   * Signals end of input. A block still open at this point is discarded and
   * described in the return value.
   */
  finish(): TruncatedBlock | undefined {
    if (this.mode === 'outside-block') {
      return undefined;
    }
    const truncated: TruncatedBlock = {
      blockNumber: this.blocksOpened,
      fieldCount: this.fields.length + (this.field === '' ? 0 : 1),
    };
    this.fields = [];
    this.field = '';
    this.mode = 'outside-block';
    return truncated;
  }
}
