/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type ScannerState = 'outside-block' | 'inside-block';

/**
 * Canonical field order of a race report once normalized:
 * write access, other access, then the creation traces paired with each.
 */
export type NormalizedReport = readonly [
  writeAccess: string,
  otherAccess: string,
  writeCreation: string,
  otherCreation: string,
];

export interface CompletedBlock {
  /** 1-based count of blocks opened so far, this one included. */
  blockNumber: number;
  fields: string[];
}

export interface TruncatedBlock {
  blockNumber: number;
  fieldCount: number;
}

export interface NormalizeRunResult {
  linesRead: number;
  blocksOpened: number;
  recordsEmitted: number;
  truncated?: TruncatedBlock;
}

export type FilterDropReason =
  | 'restore-failure'
  | 'fmt-package'
  | 'finished-goroutine'
  | 'foreign-creator';

export interface FilterRunResult {
  recordsRead: number;
  recordsKept: number;
  dropped: Record<FilterDropReason, number>;
}
