/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export class UsageError extends Error {
  constructor(public readonly program: string) {
    super(`${program}: expect no arguments`);
    this.name = 'UsageError';
  }
}

/**
 * Raised when a race report does not follow the detector's grammar.
 * Fatal for the whole run; records written before it stay written.
 */
export class ReportGrammarError extends Error {
  constructor(
    message: string,
    public readonly fields: readonly string[],
    public readonly blockNumber?: number,
  ) {
    super(message);
    this.name = 'ReportGrammarError';
  }

  withBlockNumber(blockNumber: number): ReportGrammarError {
    return new ReportGrammarError(this.message, this.fields, blockNumber);
  }
}

export class TruncatedReportError extends Error {
  constructor(
    public readonly blockNumber: number,
    public readonly fieldCount: number,
  ) {
    super(`input ended inside race report ${blockNumber} after ${fieldCount} field(s)`);
    this.name = 'TruncatedReportError';
  }
}
