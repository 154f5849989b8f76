/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './errors.js';
export * from './ordering.js';
export * from './concatenator.js';
export * from './logging.js';
export type { MergeObserver, MergeState, SegmentProgress, SegmentResult } from '../types/observer.js';
