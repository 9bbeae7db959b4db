/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { NormalizedReport } from '../types/index.js';
import { ReportGrammarError } from './errors.js';

const PREVIOUS_ACCESS = /^Previous [rw]/;
const PREVIOUS_PREFIX_LENGTH = 'Previous '.length;
const READ_ACCESS = /^Read /;
const WRITE_ACCESS = /^Write /;
const ACCESS_GOROUTINE_ID = /(?<![\p{L}\p{N}_])by\s+goroutine\s+[0-9]+:/gu;
const CREATION_GOROUTINE_ID = /^Goroutine\s+[0-9]+\s/;

export const stripAccessGoroutineId = (field: string): string =>
  field.replace(ACCESS_GOROUTINE_ID, 'by:');

export const stripCreationGoroutineId = (field: string): string =>
  field.replace(CREATION_GOROUTINE_ID, 'Goroutine ');

/**
 * Rewrites the four raw fields of one race report into canonical form:
 * the write access first, the `Previous ` marker dropped, each creation trace
 * kept next to its access, and goroutine ids removed.
 *
 * @throws ReportGrammarError when the fields do not follow the detector's grammar
 */
export function normalizeReport(fields: readonly string[]): NormalizedReport {
  if (fields.length !== 4) {
    throw new ReportGrammarError(`expected 4 fields, found ${fields.length}`, fields);
  }
  let [first, second, firstCreation, secondCreation] = fields;

  if (!PREVIOUS_ACCESS.test(second)) {
    throw new ReportGrammarError(
      'second field does not start with "Previous read" or "Previous write"',
      fields,
    );
  }
  second = second.slice(PREVIOUS_PREFIX_LENGTH);
  second = second.charAt(0).toUpperCase() + second.slice(1);

  if (READ_ACCESS.test(first)) {
    [first, second] = [second, first];
    [firstCreation, secondCreation] = [secondCreation, firstCreation];
  }
  if (!WRITE_ACCESS.test(first)) {
    throw new ReportGrammarError('expected a write access first after reordering', fields);
  }

  return [
    stripAccessGoroutineId(first),
    stripAccessGoroutineId(second),
    stripCreationGoroutineId(firstCreation),
    stripCreationGoroutineId(secondCreation),
  ];
}

export const formatRecord = (report: NormalizedReport): string => `${report.join('\t')}\n`;
