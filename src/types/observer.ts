/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { NormalizedReport, TruncatedBlock } from './report.js';

export interface NormalizeObserver {
  onRecord?(info: { blockNumber: number; report: NormalizedReport }): void;
  onTruncatedBlock?(info: TruncatedBlock): void;
}
