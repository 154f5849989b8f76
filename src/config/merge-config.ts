/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DEFAULT_BUFFER_SIZE } from '../core/concatenator.js';
import type { DuplicateKeyPolicy } from '../core/ordering.js';

export type ProgressMode = 'auto' | 'ink' | 'plain' | 'none';

export interface MergeConfig {
  bufferSize: number;
  duplicateKeys: DuplicateKeyPolicy;
  progress: ProgressMode;
}

// zlib rejects chunk sizes below 64 bytes
const MIN_BUFFER_SIZE = 64;

export const parseBufferSize = (raw: string | undefined): number | undefined => {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) {
    return undefined;
  }
  const value = Number(raw.trim());
  return Number.isSafeInteger(value) && value >= MIN_BUFFER_SIZE ? value : undefined;
};

const resolveDuplicateKeys = (raw: string | undefined): DuplicateKeyPolicy =>
  raw?.trim().toLowerCase() === 'keep-last' ? 'keep-last' : 'error';

const resolveProgressMode = (raw: string | undefined): ProgressMode => {
  const candidate = raw?.trim().toLowerCase();
  switch (candidate) {
    case 'ink':
    case 'plain':
    case 'none':
      return candidate;
    default:
      return 'auto';
  }
};

export function resolveMergeConfigFromEnv(env: NodeJS.ProcessEnv = process.env): MergeConfig {
  return {
    bufferSize: parseBufferSize(env['LOG_SPLICE_BUFFER_SIZE']) ?? DEFAULT_BUFFER_SIZE,
    duplicateKeys: resolveDuplicateKeys(env['LOG_SPLICE_DUPLICATE_KEYS']),
    progress: resolveProgressMode(env['LOG_SPLICE_PROGRESS']),
  };
}
