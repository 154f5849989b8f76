/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Merge observer interface.
 * Shared by the concatenator, the runner and the terminal UI.
 */

export interface SegmentProgress {
  /** 1-based position of the segment in the ordered sequence. */
  current: number;
  total: number;
  name: string;
}

export interface SegmentResult extends SegmentProgress {
  compressedBytes: number;
  decompressedBytes: number;
}

export type MergeState =
  | { status: 'idle' }
  | ({ status: 'processing' } & SegmentProgress)
  | { status: 'flushed'; segments: number }
  | { status: 'failed'; error: unknown };

export interface MergeObserver {
  onStateChange?(state: MergeState): void;
  onSegmentStart?(info: SegmentProgress): void;
  onSegmentComplete?(result: SegmentResult): void;
}
