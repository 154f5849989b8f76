/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import type { MergeRunOptions, MergeSummary } from '../runner/index.js';
import { runMerge } from '../runner/index.js';
import type { MergeObserver } from '../types/index.js';
import { formatBytes, formatElapsed } from '../core/logging.js';
import { calculateProgress, renderBar } from './progress-bar.js';

interface Progress {
  current: number;
  total: number;
  written: number;
}

interface AppState {
  progress: Progress;
  lastEvent: string;
}

const initialState: AppState = {
  progress: { current: 0, total: 0, written: 0 },
  lastEvent: 'Resolving segment order...',
};

export interface MergeAppProps {
  options: MergeRunOptions;
  onFinish?: (outcome: { summary?: MergeSummary; error?: unknown }) => void;
}

export const MergeApp: React.FC<MergeAppProps> = ({ options, onFinish }) => {
  const [state, setState] = useState<AppState>(initialState);
  const [summary, setSummary] = useState<MergeSummary | undefined>();
  const [error, setError] = useState<string | undefined>();
  const [startedAt] = useState(() => Date.now());
  const [now, setNow] = useState(() => Date.now());
  const { exit } = useApp();

  useEffect(() => {
    let cancelled = false;

    const observer: MergeObserver = {
      onSegmentStart: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          progress: { ...prev.progress, current: info.current, total: info.total },
          lastEvent: `Process ${info.name}`,
        }));
      },

      onSegmentComplete: (result) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          progress: {
            ...prev.progress,
            written: prev.progress.written + result.decompressedBytes,
          },
        }));
      },
    };

    runMerge({ ...options, observer })
      .then((res) => {
        if (cancelled) return;
        setSummary(res);
        onFinish?.({ summary: res });
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        setError(err instanceof Error ? err.message : String(err));
        onFinish?.({ error: err });
      });

    return () => {
      cancelled = true;
    };
  }, [options, onFinish]);

  useEffect(() => {
    if (summary || error) return;
    const timer = setInterval(() => setNow(Date.now()), 1000);
    return () => clearInterval(timer);
  }, [summary, error]);

  useEffect(() => {
    if (summary || error) {
      const timer = setTimeout(() => exit(error ? new Error(error) : undefined), 200);
      return () => clearTimeout(timer);
    }
  }, [summary, error, exit]);

  const elapsed = summary ? summary.elapsedMs : now - startedAt;
  const progressPercent = calculateProgress(state.progress.current, state.progress.total);
  const progressBar = renderBar(progressPercent, 40);

  return (
    <Box flexDirection="column">
      <Box borderStyle="round" borderColor="cyan" paddingX={1}>
        <Text bold color="cyanBright">
          LOG SPLICE
        </Text>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="gray" flexDirection="column" paddingX={1} paddingY={0}>
        <Box>
          <Text dimColor>[{formatElapsed(elapsed)}] </Text>
          <Text color="cyan">{progressBar}</Text>
          <Text>
            {' '}
            {state.progress.current}/{state.progress.total || '?'}
          </Text>
        </Box>
        <Box>
          <Text dimColor>Written: </Text>
          <Text color="greenBright">{formatBytes(state.progress.written)}</Text>
        </Box>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="magenta" paddingX={1} paddingY={0}>
        <Text bold color="magenta">
          Activity:{' '}
        </Text>
        <Text>{state.lastEvent}</Text>
      </Box>

      {summary && (
        <Box marginTop={1} borderStyle="double" borderColor="greenBright" flexDirection="column" paddingX={1} paddingY={0}>
          <Text bold color="greenBright">
            ✓ COMPLETE
          </Text>
          <Text>
            Merged {summary.segments.length} segment(s) | Read {formatBytes(summary.bytesRead)} | Wrote{' '}
            {formatBytes(summary.bytesWritten)}
          </Text>
          <Text dimColor>Output: {summary.outputPath}</Text>
        </Box>
      )}

      {error && (
        <Box marginTop={1} borderStyle="bold" borderColor="red" paddingX={1} paddingY={0}>
          <Text color="redBright">ERROR: {error}</Text>
        </Box>
      )}
    </Box>
  );
};
