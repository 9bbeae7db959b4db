/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Readable, Writable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { runNormalizeCli } from './normalize.js';
import { runFilterCli } from './filter.js';

const createSink = () => {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
};

const createIo = (input: string) => {
  const stdout = createSink();
  const stderr = createSink();
  return {
    io: { stdin: Readable.from([input]), stdout: stdout.stream, stderr: stderr.stream },
    stdout,
    stderr,
  };
};

const defaults = { strict: false, warn: false };

const threeFieldReport = [
  '==',
  'Write at 0x1 by goroutine 1:',
  '  f()',
  '',
  'Previous read at 0x1 by goroutine 2:',
  '  g()',
  '',
  'Goroutine 1 (running) created at:',
  '  m()',
  '==',
  '',
].join('\n');

describe('runNormalizeCli', () => {
  it('rejects arguments without touching stdout', async () => {
    const { io, stdout, stderr } = createIo('');
    const outcome = await runNormalizeCli(['--verbose'], io, defaults);

    expect(outcome).toEqual({ exitCode: 1 });
    expect(stderr.text()).toBe('race-normalize: expect no arguments\n');
    expect(stdout.text()).toBe('');
  });

  it('normalizes stdin to stdout', async () => {
    const { io, stdout, stderr } = createIo(
      [
        '==',
        'Write at 0x1 by goroutine 1:',
        '  f()',
        '',
        'Previous read at 0x1 by goroutine 2:',
        '  g()',
        '',
        'Goroutine 1 (running) created at:',
        '  m()',
        '',
        'Goroutine 2 (running) created at:',
        '  m()',
        '==',
        '',
      ].join('\n'),
    );
    const outcome = await runNormalizeCli([], io, defaults);

    expect(outcome.exitCode).toBe(0);
    expect(outcome.result?.recordsEmitted).toBe(1);
    expect(stdout.text()).toBe(
      'Write at 0x1 by: f()\tRead at 0x1 by: g()\t' +
        'Goroutine (running) created at: m()\tGoroutine (running) created at: m()\n',
    );
    expect(stderr.text()).toBe('');
  });

  it('reports a malformed report and exits with status 1', async () => {
    const { io, stdout, stderr } = createIo(threeFieldReport);
    const outcome = await runNormalizeCli([], io, defaults);

    expect(outcome).toEqual({ exitCode: 1 });
    expect(stdout.text()).toBe('');
    expect(stderr.text()).toBe(
      '[race-normalize] error: malformed race report:\n' +
        '  reason = expected 4 fields, found 3\n' +
        '  block  = 1\n' +
        '  fields = 3\n' +
        '  first  = Write at 0x1 by goroutine 1: f()\n',
    );
  });

  it('drops a truncated report silently by default', async () => {
    const { io, stdout, stderr } = createIo('==\nWrite at 0x1\n');
    const outcome = await runNormalizeCli([], io, defaults);

    expect(outcome.exitCode).toBe(0);
    expect(stdout.text()).toBe('');
    expect(stderr.text()).toBe('');
  });

  it('warns about a truncated report when warnings are enabled', async () => {
    const { io, stdout, stderr } = createIo('==\nWrite at 0x1 by goroutine 1:\n\n  f()\n');
    const outcome = await runNormalizeCli([], io, { strict: false, warn: true });

    expect(outcome.exitCode).toBe(0);
    expect(stdout.text()).toBe('');
    expect(stderr.text()).toBe(
      '[race-normalize] warning: dropped truncated race report:\n' +
        '  block  = 1\n' +
        '  fields = 2\n',
    );
  });

  it('fails on truncation in strict mode', async () => {
    const { io, stderr } = createIo('==\nWrite at 0x1\n');
    const outcome = await runNormalizeCli([], io, { strict: true, warn: false });
    expect(outcome).toEqual({ exitCode: 1 });
    expect(stderr.text()).toBe(
      '[race-normalize] error: truncated race report:\n  block  = 1\n  fields = 1\n',
    );
  });
});

describe('runFilterCli', () => {
  it('rejects arguments', async () => {
    const { io, stdout, stderr } = createIo('');
    const outcome = await runFilterCli(['x'], io, { creator: '' });
    expect(outcome).toEqual({ exitCode: 1 });
    expect(stderr.text()).toBe('race-filter: expect no arguments\n');
    expect(stdout.text()).toBe('');
  });

  it('filters stdin to stdout', async () => {
    const kept = 'Write at 0x1 by: f()\tRead at 0x1 by: g()\tGoroutine (running) created at: m()\tGoroutine (running) created at: m()';
    const dropped = kept.replace('f()', 'fmt.Print()');
    const { io, stdout } = createIo(`${kept}\n${dropped}\n`);
    const outcome = await runFilterCli([], io, { creator: '' });

    expect(outcome.exitCode).toBe(0);
    expect(outcome.result?.recordsKept).toBe(1);
    expect(stdout.text()).toBe(`${kept}\n`);
  });
});
