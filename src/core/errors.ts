/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogSpliceErrorCode =
  | 'MALFORMED_FILENAME'
  | 'DUPLICATE_KEY'
  | 'SEGMENT_OPEN_FAILED'
  | 'DECOMPRESSION_FAILED'
  | 'SINK_IO_FAILED';

/**
 * Base class for every failure the merge core reports.
 * `details` carries the context a caller needs to log and exit.
 */
export class LogSpliceError extends Error {
  constructor(
    public readonly code: LogSpliceErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedFilenameError extends LogSpliceError {
  constructor(public readonly segmentName: string, reason: string) {
    super('MALFORMED_FILENAME', `Wrong filename format! (${segmentName}): ${reason}`, {
      name: segmentName,
      reason,
    });
  }
}

export class DuplicateKeyError extends LogSpliceError {
  constructor(public readonly key: number, public readonly names: string[]) {
    super('DUPLICATE_KEY', `Ordering key ${key} is shared by ${names.join(', ')}`, {
      key,
      names,
    });
  }
}

export class SegmentOpenFailedError extends LogSpliceError {
  constructor(public readonly segmentName: string, cause: unknown) {
    super(
      'SEGMENT_OPEN_FAILED',
      `Failed to open archive file (${segmentName}): ${describeCause(cause)}`,
      { name: segmentName },
      { cause },
    );
  }
}

export class DecompressionFailedError extends LogSpliceError {
  constructor(public readonly segmentName: string, cause: unknown) {
    super(
      'DECOMPRESSION_FAILED',
      `Failed to decompress archive file (${segmentName}): ${describeCause(cause)}`,
      { name: segmentName },
      { cause },
    );
  }
}

export class SinkIOFailedError extends LogSpliceError {
  constructor(cause: unknown, target?: string) {
    super(
      'SINK_IO_FAILED',
      `Failed to write output${target ? ` (${target})` : ''}: ${describeCause(cause)}`,
      target ? { target } : {},
      { cause },
    );
  }
}

export const isLogSpliceError = (value: unknown): value is LogSpliceError =>
  value instanceof LogSpliceError;

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
