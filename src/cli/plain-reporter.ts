/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { formatBytes, formatElapsed, logConsole } from '../core/logging.js';
import { isLogSpliceError } from '../core/errors.js';
import type { MergeObserver } from '../types/index.js';
import type { MergeSummary } from '../runner/index.js';

/**
 * Progress for non-TTY output: one log block per segment.
 */
export const createPlainObserver = (): MergeObserver => ({
  onSegmentStart: (info) => {
    logConsole('info', 'segment', [
      ['progress', `${info.current}/${info.total}`],
      ['file', info.name],
    ]);
  },
});

export const reportSummary = (summary: MergeSummary): void => {
  logConsole('info', 'complete', [
    ['segments', summary.segments.length],
    ['read', formatBytes(summary.bytesRead)],
    ['written', formatBytes(summary.bytesWritten)],
    ['elapsed', formatElapsed(summary.elapsedMs)],
    ['output', summary.outputPath],
  ]);
};

export const reportFailure = (error: unknown): void => {
  if (isLogSpliceError(error)) {
    const name = error.details['name'];
    const cause = error.cause instanceof Error ? error.cause.message : undefined;
    logConsole('error', 'failed', [
      ['code', error.code],
      ['file', typeof name === 'string' ? name : undefined],
      ['message', error.message],
      ['cause', cause],
    ]);
    return;
  }
  logConsole('error', 'failed', [['message', error instanceof Error ? error.message : String(error)]]);
};
