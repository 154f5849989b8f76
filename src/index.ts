/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './core/index.js';
export { runMerge, type MergeRunOptions, type MergeSummary } from './runner/index.js';
export { resolveMergeConfigFromEnv, type MergeConfig, type ProgressMode } from './config/merge-config.js';
export { main as runCli } from './cli/main.js';
