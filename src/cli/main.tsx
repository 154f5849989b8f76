/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React from 'react';
import { render } from 'ink';
import type { MergeRunOptions, MergeSummary } from '../runner/index.js';
import { runMerge } from '../runner/index.js';
import { MergeApp } from '../ui/merge-app.js';
import { parseArgs, USAGE } from './args.js';
import { runInteractiveSetup } from './interactive.js';
import { createPlainObserver, reportFailure, reportSummary } from './plain-reporter.js';
import { resolveMergeConfigFromEnv, type ProgressMode } from '../config/merge-config.js';

const resolveProgressMode = (configured: ProgressMode, plainFlag: boolean): ProgressMode => {
  if (plainFlag) return 'plain';
  if (configured !== 'auto') return configured;
  return process.stdout.isTTY ? 'ink' : 'plain';
};

export const main = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  const options = parseArgs(argv);
  if (options.help) {
    console.log(USAGE);
    return;
  }

  if (options.interactive) {
    await runInteractiveSetup(options);
  }

  if (!options.outputPath) {
    throw new Error('Missing --output <path> argument.');
  }
  if (options.inputs.length === 0) {
    throw new Error('No segment files given.');
  }

  const config = resolveMergeConfigFromEnv();
  const mode = resolveProgressMode(config.progress, options.plain ?? false);
  const runOptions: MergeRunOptions = {
    inputs: options.inputs,
    outputPath: options.outputPath,
    bufferSize: options.bufferSize ?? config.bufferSize,
    duplicateKeys: options.keepLastDuplicate ? 'keep-last' : config.duplicateKeys,
  };

  if (mode === 'ink') {
    let failure: unknown;
    const onFinish = (outcome: { summary?: MergeSummary; error?: unknown }) => {
      failure = outcome.error;
    };
    const { waitUntilExit } = render(<MergeApp options={runOptions} onFinish={onFinish} />);
    try {
      await waitUntilExit();
    } catch (error) {
      // the app has already rendered the failure
      if (failure === undefined) throw error;
    }
    if (failure !== undefined) {
      process.exitCode = 1;
    }
    return;
  }

  try {
    const summary = await runMerge({
      ...runOptions,
      observer: mode === 'plain' ? createPlainObserver() : undefined,
    });
    if (mode === 'plain') {
      reportSummary(summary);
    }
  } catch (error) {
    reportFailure(error);
    process.exitCode = 1;
  }
};
