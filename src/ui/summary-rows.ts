/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { NormalizeRunResult } from '../types/index.js';

export interface SummaryRow {
  label: string;
  value: string;
  tone: 'normal' | 'good' | 'warn';
}

export const buildSummaryRows = (result: NormalizeRunResult): SummaryRow[] => [
  { label: 'Lines read', value: String(result.linesRead), tone: 'normal' },
  { label: 'Reports seen', value: String(result.blocksOpened), tone: 'normal' },
  { label: 'Records emitted', value: String(result.recordsEmitted), tone: 'good' },
  result.truncated
    ? {
        label: 'Truncated',
        value: `report ${result.truncated.blockNumber} dropped after ${result.truncated.fieldCount} field(s)`,
        tone: 'warn',
      }
    : { label: 'Truncated', value: 'none', tone: 'normal' },
];
