/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { resolve } from 'node:path';
import { parseArgs } from '../cli/args.js';
import { splitInputList } from '../cli/interactive.js';
import { createPlainObserver, reportFailure, reportSummary } from '../cli/plain-reporter.js';
import { SegmentOpenFailedError } from '../core/errors.js';

describe('parseArgs', () => {
  it('collects the output path and positional segments', () => {
    const options = parseArgs(['-o', 'out.log', 'app.log.2.gz', 'app.log.1.gz']);

    expect(options.outputPath).toBe(resolve('out.log'));
    expect(options.inputs).toEqual(['app.log.2.gz', 'app.log.1.gz']);
    expect(options.keepLastDuplicate).toBeUndefined();
  });

  it('reads every flag', () => {
    const options = parseArgs([
      '--output',
      '/tmp/merged.log',
      '--keep-last-duplicate',
      '--buffer-size',
      '4096',
      '--plain',
      '--interactive',
      'a.1.gz',
    ]);

    expect(options).toEqual({
      outputPath: '/tmp/merged.log',
      inputs: ['a.1.gz'],
      keepLastDuplicate: true,
      bufferSize: 4096,
      plain: true,
      interactive: true,
    });
  });

  it('treats everything after -- as segments', () => {
    expect(parseArgs(['-o', 'x', '--', '-odd.1.gz', '--plain']).inputs).toEqual([
      '-odd.1.gz',
      '--plain',
    ]);
  });

  it('rejects unknown flags, missing values and bad buffer sizes', () => {
    expect(() => parseArgs(['--bogus'])).toThrow('Unknown argument: --bogus');
    expect(() => parseArgs(['-o'])).toThrow('Missing value for -o');
    expect(() => parseArgs(['--buffer-size', '12'])).toThrow('Invalid --buffer-size: 12');
  });

  it('flags a help request', () => {
    expect(parseArgs(['-h']).help).toBe(true);
  });
});

describe('splitInputList', () => {
  it('splits on commas and whitespace', () => {
    expect(splitInputList(' a.1.gz, b.2.gz  c.3.gz,,')).toEqual(['a.1.gz', 'b.2.gz', 'c.3.gz']);
  });
});

describe('plain reporter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs one block per segment', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    createPlainObserver().onSegmentStart?.({ current: 2, total: 3, name: 'app.log.2.gz' });

    expect(log).toHaveBeenCalledWith(
      '[log-splice] segment:\n  progress = 2/3\n  file     = app.log.2.gz',
    );
  });

  it('summarises a finished run', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    reportSummary({
      outputPath: '/tmp/merged.log',
      orderedInputs: ['a.1.gz'],
      segments: [{ current: 1, total: 1, name: 'a.1.gz', compressedBytes: 40, decompressedBytes: 2048 }],
      bytesRead: 40,
      bytesWritten: 2048,
      elapsedMs: 61_000,
    });

    expect(log).toHaveBeenCalledWith(
      [
        '[log-splice] complete:',
        '  segments = 1',
        '  read     = 40 B',
        '  written  = 2.0 KiB',
        '  elapsed  = 00:01:01',
        '  output   = /tmp/merged.log',
      ].join('\n'),
    );
  });

  it('names the failing segment and its cause', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    reportFailure(new SegmentOpenFailedError('app.log.2.gz', new Error('no such file')));

    expect(error).toHaveBeenCalledWith(
      [
        '[log-splice] failed:',
        '  code    = SEGMENT_OPEN_FAILED',
        '  file    = app.log.2.gz',
        '  message = Failed to open archive file (app.log.2.gz): no such file',
        '  cause   = no such file',
      ].join('\n'),
    );
  });

  it('falls back to the message for other errors', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    reportFailure(new Error('No segment files given.'));

    expect(error).toHaveBeenCalledWith('[log-splice] failed:\n  message = No segment files given.');
  });
});
