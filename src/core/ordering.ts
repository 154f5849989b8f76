/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DuplicateKeyError, MalformedFilenameError } from './errors.js';

export type DuplicateKeyPolicy = 'error' | 'keep-last';

export interface ResolveOrderOptions {
  /** What to do when two names share an ordering key. Defaults to `error`. */
  duplicateKeys?: DuplicateKeyPolicy;
}

const MAX_ORDERING_KEY = 0xffff_ffff;

/**
 * Extracts the numeric ordering key from a `<stem>.<key>.<ext>` segment name,
 * e.g. `a.log.4.gz` yields 4.
 */
export function extractOrderingKey(name: string): number {
  const parts = name.split('.');
  if (parts.length < 2) {
    throw new MalformedFilenameError(name, 'no ordering key segment');
  }
  const segment = parts[parts.length - 2];
  if (!/^\d+$/.test(segment)) {
    throw new MalformedFilenameError(name, `"${segment}" is not a non-negative integer`);
  }
  const key = Number(segment);
  if (key > MAX_ORDERING_KEY) {
    throw new MalformedFilenameError(name, `"${segment}" is out of range`);
  }
  return key;
}

/**
 * Orders segment names ascending by their numeric key.
 * All names are validated before anything is returned, so a malformed name
 * fails the whole call.
 */
export function resolveSegmentOrder(
  names: readonly string[],
  options: ResolveOrderOptions = {},
): string[] {
  const policy = options.duplicateKeys ?? 'error';
  const entries = names.map((name) => ({ key: extractOrderingKey(name), name }));

  // Array.prototype.sort is stable, so equal keys keep their input order.
  entries.sort((a, b) => a.key - b.key);

  const ordered: string[] = [];
  for (let i = 0; i < entries.length; i += 1) {
    const entry = entries[i];
    let last = i;
    while (last + 1 < entries.length && entries[last + 1].key === entry.key) {
      last += 1;
    }
    if (last > i) {
      const group = entries.slice(i, last + 1);
      if (policy === 'error') {
        throw new DuplicateKeyError(
          entry.key,
          group.map((item) => item.name),
        );
      }
      ordered.push(group[group.length - 1].name);
      i = last;
      continue;
    }
    ordered.push(entry.name);
  }
  return ordered;
}
