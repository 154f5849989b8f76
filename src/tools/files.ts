/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createWriteStream, promises as fs, type WriteStream } from 'node:fs';
import { once } from 'node:events';
import { dirname } from 'node:path';
import { SinkIOFailedError } from '../core/errors.js';

export const ensureDirectory = async (dirPath: string): Promise<void> => {
  await fs.mkdir(dirPath, { recursive: true });
};

/**
 * Opens `filePath` for writing, creating it or truncating existing content.
 * Resolves once the descriptor is open so open failures surface before any
 * segment is read.
 */
export const openOutputSink = async (filePath: string): Promise<WriteStream> => {
  try {
    await ensureDirectory(dirname(filePath));
    const stream = createWriteStream(filePath, { flags: 'w' });
    await once(stream, 'open');
    return stream;
  } catch (error) {
    throw new SinkIOFailedError(error, filePath);
  }
};

export const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};
