/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'info' | 'warn' | 'error';

export interface LogSink {
  write(chunk: string): unknown;
}

/**
 * Formats a structured diagnostic block.
 * Each non-empty field is printed on its own line, keys padded to align the values.
 */
export const formatLogBlock = (
  program: string,
  level: LogLevel,
  label: string,
  fields: Array<[string, string | number | undefined | null]>,
): string => {
  const filtered = fields.filter(
    (entry): entry is [string, string | number] =>
      entry[1] !== undefined && entry[1] !== null && entry[1] !== '',
  );
  const width = filtered.reduce((max, [key]) => Math.max(max, key.length), 0);
  const severity = level === 'info' ? '' : `${level === 'warn' ? 'warning' : 'error'}: `;
  const lines: string[] = [`[${program}] ${severity}${label}:`];
  for (const [key, value] of filtered) {
    lines.push(`  ${key.padEnd(width)} = ${value}`);
  }
  return `${lines.join('\n')}\n`;
};

/**
 * Console logger bound to the error stream; stdout carries records only.
 */
export class ConsoleLogger {
  constructor(
    private readonly program: string,
    private readonly sink: LogSink = process.stderr,
    private readonly quiet = false,
  ) {}

  log(
    level: LogLevel,
    label: string,
    fields: Array<[string, string | number | undefined | null]> = [],
  ): void {
    if (this.quiet && level !== 'error') {
      return;
    }
    this.sink.write(formatLogBlock(this.program, level, label, fields));
  }

  warn(label: string, fields?: Array<[string, string | number | undefined | null]>): void {
    this.log('warn', label, fields);
  }

  error(label: string, fields?: Array<[string, string | number | undefined | null]>): void {
    this.log('error', label, fields);
  }
}
