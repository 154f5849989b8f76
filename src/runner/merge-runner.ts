/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import { concatenateSegments, type ConcatenationResult } from '../core/concatenator.js';
import { resolveSegmentOrder, type DuplicateKeyPolicy } from '../core/ordering.js';
import type { MergeObserver } from '../types/observer.js';
import { openOutputSink } from '../tools/files.js';

export interface MergeRunOptions {
  inputs: readonly string[];
  outputPath: string;
  observer?: MergeObserver;
  bufferSize?: number;
  duplicateKeys?: DuplicateKeyPolicy;
}

export interface MergeSummary extends ConcatenationResult {
  outputPath: string;
  orderedInputs: string[];
  elapsedMs: number;
}

/**
 * Main entry point for rebuilding one log from rotated gzip segments.
 * Orders the inputs, truncates the output and streams every segment into it.
 */
export async function runMerge(options: MergeRunOptions): Promise<MergeSummary> {
  const startedAt = Date.now();
  // Ordering errors are raised here, before the output file is touched.
  const orderedInputs = resolveSegmentOrder(options.inputs, {
    duplicateKeys: options.duplicateKeys,
  });

  const outputPath = resolve(options.outputPath);
  const sink = await openOutputSink(outputPath);
  const result = await concatenateSegments(orderedInputs, sink, {
    observer: options.observer,
    bufferSize: options.bufferSize,
  });

  return {
    ...result,
    outputPath,
    orderedInputs,
    elapsedMs: Date.now() - startedAt,
  };
}
