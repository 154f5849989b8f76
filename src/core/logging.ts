/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'info' | 'warn' | 'error';

/**
 * Unified console logger with structured, multiline output.
 * Each non-empty field is printed on its own line for readability.
 */
export const logConsole = (
  level: LogLevel,
  label: string,
  fields: Array<[string, string | number | undefined | null]>,
): void => {
  const output = formatLogBlock(label, fields);
  if (level === 'warn') {
    console.warn(output);
  } else if (level === 'error') {
    console.error(output);
  } else {
    console.log(output);
  }
};

export const formatLogBlock = (
  label: string,
  fields: Array<[string, string | number | undefined | null]>,
): string => {
  const filtered = fields.filter(
    (field): field is [string, string | number] =>
      field[1] !== undefined && field[1] !== null && field[1] !== '',
  );
  const width = filtered.reduce((max, [key]) => Math.max(max, key.length), 0);
  const lines: string[] = [`[log-splice] ${label}:`];
  for (const [key, value] of filtered) {
    lines.push(`  ${key.padEnd(width)} = ${value}`);
  }
  return lines.join('\n');
};

const BYTE_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];

/**
 * Human-readable byte count, e.g. `1536` -> `1.5 KiB`.
 */
export const formatBytes = (bytes: number): string => {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return unit === 0 ? `${value} ${BYTE_UNITS[0]}` : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
};

/**
 * Formats a duration as `HH:MM:SS`.
 */
export const formatElapsed = (elapsedMs: number): string => {
  const totalSeconds = Math.max(0, Math.floor(elapsedMs / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, '0')).join(':');
};
