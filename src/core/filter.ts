/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { FilterDropReason } from '../types/index.js';

export const DEFAULT_CREATOR = 'onedge.WrapFuncR';

export interface RecordFilterOptions {
  /**
   * Function that must appear as `created at: <creator>` in a kept record.
   * An empty string keeps records regardless of their creator.
   */
  creator?: string;
}

// Word characters include non-ASCII letters and digits, as in a UTF-8 locale.
const RESTORE_FAILURE = /(?<![\p{L}\p{N}_])failed to restore the stack(?![\p{L}\p{N}_])/u;
const FMT_PACKAGE = /(?<![\p{L}\p{N}_])fmt\./u;
const FINISHED_GOROUTINE = /(?<![\p{L}\p{N}_])Goroutine \(finished\)/u;

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export const buildCreatorPattern = (creator: string): RegExp =>
  new RegExp(`(?<![\\p{L}\\p{N}_])created at: ${escapeRegex(creator)}(?![\\p{L}\\p{N}_])`, 'u');

/**
 * Compiled form of {@link RecordFilterOptions}, built once per run.
 */
export class RecordFilter {
  private readonly creatorPattern?: RegExp;

  constructor(options: RecordFilterOptions = {}) {
    const creator = options.creator ?? DEFAULT_CREATOR;
    this.creatorPattern = creator === '' ? undefined : buildCreatorPattern(creator);
  }

  /**
   * Returns why a normalized record should be dropped, or undefined to keep it.
   */
  classify(record: string): FilterDropReason | undefined {
    if (RESTORE_FAILURE.test(record)) {
      return 'restore-failure';
    }
    if (FMT_PACKAGE.test(record)) {
      return 'fmt-package';
    }
    if (FINISHED_GOROUTINE.test(record)) {
      return 'finished-goroutine';
    }
    if (this.creatorPattern && !this.creatorPattern.test(record)) {
      return 'foreign-creator';
    }
    return undefined;
  }
}

export const classifyRecord = (
  record: string,
  options: RecordFilterOptions = {},
): FilterDropReason | undefined => new RecordFilter(options).classify(record);
