/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  runMerge,
  type MergeRunOptions,
  type MergeSummary,
} from './merge-runner.js';
