/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { open, type FileHandle } from 'node:fs/promises';
import { Transform, type Writable } from 'node:stream';
import { finished, pipeline } from 'node:stream/promises';
import { createGunzip } from 'node:zlib';
import type { MergeObserver, SegmentResult } from '../types/observer.js';
import {
  DecompressionFailedError,
  describeCause,
  LogSpliceError,
  SegmentOpenFailedError,
  SinkIOFailedError,
} from './errors.js';

export const DEFAULT_BUFFER_SIZE = 64 * 1024;

export interface ConcatenateOptions {
  observer?: MergeObserver;
  /** Read and inflate chunk size in bytes. */
  bufferSize?: number;
}

export interface ConcatenationResult {
  segments: SegmentResult[];
  bytesRead: number;
  bytesWritten: number;
}

type FailureStage = 'read' | 'decompress' | 'write';

interface FailureTracker {
  first?: { stage: FailureStage; error: unknown };
}

/**
 * Decompresses each gzip segment in the given order and appends the output to
 * `sink`, then ends the sink and waits for it to flush.
 *
 * The sink belongs to this call until it returns. The first failure is fatal:
 * remaining segments are not opened, the sink is closed with whatever was
 * written so far and the typed error is rethrown.
 */
export async function concatenateSegments(
  orderedNames: readonly string[],
  sink: Writable,
  options: ConcatenateOptions = {},
): Promise<ConcatenationResult> {
  const { observer } = options;
  const bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
  const total = orderedNames.length;
  const segments: SegmentResult[] = [];
  const tracker: FailureTracker = {};
  const onSinkError = (error: unknown) => {
    tracker.first ??= { stage: 'write', error };
  };

  observer?.onStateChange?.({ status: 'idle' });
  sink.on('error', onSinkError);
  try {
    for (let i = 0; i < total; i += 1) {
      const name = orderedNames[i];
      const progress = { current: i + 1, total, name };
      observer?.onStateChange?.({ status: 'processing', ...progress });
      observer?.onSegmentStart?.(progress);

      const copied = await copySegment(name, sink, bufferSize, tracker);
      const segment: SegmentResult = { ...progress, ...copied };
      segments.push(segment);
      observer?.onSegmentComplete?.(segment);
    }

    await flushSink(sink);
  } catch (error) {
    const closeError = await releaseSink(sink);
    if (closeError !== undefined && error instanceof LogSpliceError) {
      error.details['sinkCloseError'] = describeCause(closeError);
    }
    observer?.onStateChange?.({ status: 'failed', error });
    throw error;
  } finally {
    sink.off('error', onSinkError);
  }

  observer?.onStateChange?.({ status: 'flushed', segments: segments.length });
  return {
    segments,
    bytesRead: segments.reduce((sum, segment) => sum + segment.compressedBytes, 0),
    bytesWritten: segments.reduce((sum, segment) => sum + segment.decompressedBytes, 0),
  };
}

async function copySegment(
  name: string,
  sink: Writable,
  bufferSize: number,
  tracker: FailureTracker,
): Promise<{ compressedBytes: number; decompressedBytes: number }> {
  let handle: FileHandle;
  try {
    handle = await open(name, 'r');
  } catch (error) {
    throw new SegmentOpenFailedError(name, error);
  }

  let compressedBytes = 0;
  let decompressedBytes = 0;
  const source = handle.createReadStream({ highWaterMark: bufferSize });
  const gunzip = createGunzip({ chunkSize: bufferSize });

  // pipeline() rejects with a single error; the first stream to emit one says where it came from.
  source.once('error', (error: unknown) => {
    tracker.first ??= { stage: 'read', error };
  });
  gunzip.once('error', (error: unknown) => {
    tracker.first ??= { stage: 'decompress', error };
  });

  try {
    await pipeline(
      source,
      countBytes((n) => {
        compressedBytes += n;
      }),
      gunzip,
      countBytes((n) => {
        decompressedBytes += n;
      }),
      sink,
      { end: false },
    );
  } catch (error) {
    const stage = tracker.first?.stage ?? 'decompress';
    const cause = tracker.first?.error ?? error;
    if (stage === 'write') {
      throw new SinkIOFailedError(cause);
    }
    throw new DecompressionFailedError(name, cause);
  }

  return { compressedBytes, decompressedBytes };
}

async function flushSink(sink: Writable): Promise<void> {
  try {
    sink.end();
    await finished(sink);
  } catch (error) {
    throw new SinkIOFailedError(error);
  }
}

/**
 * Closes the sink after a failure. An intact sink is ended so the bytes of the
 * segments already copied reach the medium, and any error it reports while
 * flushing is returned. A broken sink is destroyed; its error is already the
 * one being thrown.
 */
async function releaseSink(sink: Writable): Promise<unknown> {
  const intact = !(sink.destroyed || sink.writableEnded || sink.errored);
  if (intact) {
    sink.end();
  } else {
    sink.destroy();
  }
  // finished() settles on finish, error or premature close, so sinks built
  // with emitClose: false do not stall the release.
  const closeError = await finished(sink).then(
    () => undefined,
    (error: unknown) => error,
  );
  return intact ? closeError : undefined;
}

function countBytes(onBytes: (count: number) => void): Transform {
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      onBytes(chunk.length);
      callback(null, chunk);
    },
  });
}
