/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatBytes, formatElapsed, formatLogBlock, logConsole } from '../core/logging.js';

describe('formatLogBlock', () => {
  it('aligns keys and drops empty fields', () => {
    expect(
      formatLogBlock('segment', [
        ['progress', '1/3'],
        ['file', 'a.log.1.gz'],
        ['skipped', undefined],
        ['blank', ''],
      ]),
    ).toBe('[log-splice] segment:\n  progress = 1/3\n  file     = a.log.1.gz');
  });
});

describe('logConsole', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('routes warnings to console.warn', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    logConsole('warn', 'notice', [['count', 0]]);

    expect(warn).toHaveBeenCalledWith('[log-splice] notice:\n  count = 0');
  });
});

describe('formatBytes', () => {
  it('scales by 1024', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KiB');
    expect(formatBytes(1024 * 1024)).toBe('1.0 MiB');
  });
});

describe('formatElapsed', () => {
  it('prints hours, minutes and seconds', () => {
    expect(formatElapsed(999)).toBe('00:00:00');
    expect(formatElapsed(3_723_000)).toBe('01:02:03');
  });
});
