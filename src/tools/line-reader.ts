/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createReadStream } from 'node:fs';
import readline from 'node:readline';

/**
 * Streams the lines of a log file. The stream is opened on the first
 * iteration and closed on every exit path, including early breaks.
 *
 * @param filePath - Path to the log file
 * @yields Raw lines, without line terminators
 */
export async function* streamLogLines(filePath: string): AsyncGenerator<string> {
  const stream = createReadStream(filePath, { encoding: 'utf8' });
  const rl = readline.createInterface({
    input: stream,
    crlfDelay: Infinity,
  });
  try {
    for await (const line of rl) {
      yield line;
    }
  } finally {
    rl.close();
    stream.close();
  }
}

/**
 * Reads the first `limit` non-empty, trimmed lines of a file and stops
 * reading as soon as they are collected.
 */
export async function readSampleLines(filePath: string, limit: number): Promise<string[]> {
  const sample: string[] = [];
  if (limit <= 0) {
    return sample;
  }
  for await (const rawLine of streamLogLines(filePath)) {
    const line = rawLine.trim();
    if (line.length === 0) {
      continue;
    }
    sample.push(line);
    if (sample.length >= limit) {
      break;
    }
  }
  return sample;
}
