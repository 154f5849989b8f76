/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import { gzipSync } from 'node:zlib';

/** gzip member wrapping "Hello World\n" with an FNAME header of "in.txt". */
export const HELLO_WORLD_GZIP = Buffer.from([
  0x1f, 0x8b, 0x08, 0x08, 0x60, 0x6d, 0xd8, 0x62, 0x00, 0x03, 0x69, 0x6e, 0x2e, 0x74, 0x78, 0x74,
  0x00, 0xf3, 0x48, 0xcd, 0xc9, 0xc9, 0x57, 0x08, 0xcf, 0x2f, 0xca, 0x49, 0xe1, 0x02, 0x00, 0xe3,
  0xe5, 0x95, 0xb0, 0x0c, 0x00, 0x00, 0x00,
]);

export function makeTempDir(prefix = 'log-splice-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Writes `content` gzip-compressed to `dir/name` and returns the full path. */
export function writeSegment(dir: string, name: string, content: string | Buffer): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, gzipSync(content));
  return filePath;
}

export interface MemorySink {
  sink: Writable;
  text(): string;
}

export function memorySink(): MemorySink {
  const chunks: Buffer[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    },
  });
  return { sink, text: () => Buffer.concat(chunks).toString('utf8') };
}

export function failingSink(message: string): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback(new Error(message));
    },
  });
}

export async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

export function expectInstance<T>(value: unknown, ctor: abstract new (...args: never[]) => T): T {
  if (!(value instanceof ctor)) {
    throw new Error(`expected an instance of ${ctor.name}, got ${String(value)}`);
  }
  return value;
}
