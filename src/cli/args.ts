/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import { parseBufferSize } from '../config/merge-config.js';

export interface RunnerOptions {
  outputPath: string;
  inputs: string[];
  interactive?: boolean;
  keepLastDuplicate?: boolean;
  bufferSize?: number;
  plain?: boolean;
  help?: boolean;
}

export const USAGE = `Usage: log-splice [options] <segment...>

Rebuilds one log from rotated gzip segments (app.log.1.gz, app.log.2.gz, ...),
ordered by the number before the last extension.

Options:
  -o, --output <path>       Destination file (created or truncated)
      --interactive         Prompt for the output path and segments
      --keep-last-duplicate Keep the last name when two segments share a number
      --buffer-size <bytes> Streaming chunk size (min 64)
      --plain               Plain log lines instead of the progress view
  -h, --help                Show this help`;

const requireValue = (argv: string[], index: number, flag: string): string => {
  const value = argv[index];
  if (value === undefined || value.length === 0) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
};

export const parseArgs = (argv: string[]): RunnerOptions => {
  const options: RunnerOptions = {
    outputPath: '',
    inputs: [],
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--output':
      case '-o':
        options.outputPath = resolve(requireValue(argv, ++i, arg));
        break;
      case '--interactive':
        options.interactive = true;
        break;
      case '--keep-last-duplicate':
        options.keepLastDuplicate = true;
        break;
      case '--buffer-size': {
        const raw = requireValue(argv, ++i, arg);
        const size = parseBufferSize(raw);
        if (size === undefined) {
          throw new Error(`Invalid --buffer-size: ${raw}`);
        }
        options.bufferSize = size;
        break;
      }
      case '--plain':
        options.plain = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--':
        options.inputs.push(...argv.slice(i + 1));
        i = argv.length;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown argument: ${arg}`);
        }
        options.inputs.push(arg);
    }
  }

  return options;
};
