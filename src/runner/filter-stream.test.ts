/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Readable, Writable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { filterStream } from './filter-stream.js';

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

const kept =
  'Write at 0x1 by: a()\tRead at 0x1 by: b()\t' +
  'Goroutine (running) created at: onedge.WrapFuncR() /w.go:1\t' +
  'Goroutine (running) created at: onedge.WrapFuncR() /w.go:2';
const finished = kept.replace('Goroutine (running)', 'Goroutine (finished)');
const viaFmt = kept.replace('a()', 'fmt.Sprintf()');
const foreign = kept.replace(/onedge\.WrapFuncR/g, 'main.main');

describe('filterStream', () => {
  it('copies kept records and counts the dropped ones', async () => {
    const sink = createSink();
    const input = [kept, finished, '', viaFmt, foreign, kept].join('\n');
    const result = await filterStream(Readable.from([`${input}\n`]), sink.stream);

    expect(sink.text()).toBe(`${kept}\n${kept}\n`);
    expect(result).toEqual({
      recordsRead: 5,
      recordsKept: 2,
      dropped: {
        'restore-failure': 0,
        'fmt-package': 1,
        'finished-goroutine': 1,
        'foreign-creator': 1,
      },
    });
  });

  it('passes the creator option through', async () => {
    const sink = createSink();
    const result = await filterStream(Readable.from([foreign]), sink.stream, { creator: 'main.main' });
    expect(sink.text()).toBe(`${foreign}\n`);
    expect(result.recordsKept).toBe(1);
  });
});
