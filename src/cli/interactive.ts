/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import prompts from 'prompts';
import type { RunnerOptions } from './args.js';
import { fileExists } from '../tools/files.js';

export const splitInputList = (value: string): string[] =>
  value
    .split(/[,\s]+/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

export async function runInteractiveSetup(options: RunnerOptions): Promise<void> {
  const onCancel = () => {
    console.log('Interactive setup cancelled.');
    process.exit(1);
  };

  const responses = await prompts(
    [
      {
        type: 'text',
        name: 'inputs',
        message: 'Segment files to merge (space or comma separated)',
        initial: options.inputs.join(' '),
      },
      {
        type: 'text',
        name: 'outputPath',
        message: 'Destination file for the rebuilt log',
        initial: options.outputPath,
      },
      {
        type: 'toggle',
        name: 'keepLastDuplicate',
        message: 'When two segments share a number, keep the last one instead of failing?',
        initial: options.keepLastDuplicate ?? false,
        active: 'yes',
        inactive: 'no',
      },
    ],
    { onCancel },
  );

  if (typeof responses.inputs === 'string') {
    options.inputs = splitInputList(responses.inputs);
  }
  if (typeof responses.outputPath === 'string' && responses.outputPath.trim()) {
    options.outputPath = resolve(responses.outputPath.trim());
  }
  if (typeof responses.keepLastDuplicate === 'boolean') {
    options.keepLastDuplicate = responses.keepLastDuplicate;
  }

  if (options.outputPath && (await fileExists(options.outputPath))) {
    const { overwrite } = await prompts(
      {
        type: 'confirm',
        name: 'overwrite',
        message: `${options.outputPath} exists and will be truncated. Continue?`,
        initial: true,
      },
      { onCancel },
    );
    if (overwrite !== true) {
      onCancel();
    }
  }
}
