/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogField = [string, string | number | boolean | undefined | null];

/**
 * Unified console logger with structured, multiline output.
 * Each non-empty field is printed on its own line for readability.
 * Everything goes to stderr: stdout carries the JSON envelope in --json mode.
 * Debug output is only written when LOGSIFT_DEBUG is set.
 */
export const logConsole = (level: LogLevel, label: string, fields: LogField[] = []): void => {
  if (level === 'debug' && !isDebugEnabled()) {
    return;
  }
  const filtered = fields.filter(
    (field): field is [string, string | number | boolean] =>
      field[1] !== undefined && field[1] !== null && field[1] !== '',
  );
  const width = filtered.reduce((max, [key]) => Math.max(max, key.length), 0);
  const lines: string[] = [`[logsift] ${label}:`];
  for (const [key, value] of filtered) {
    lines.push(`  ${key.padEnd(width)} = ${value}`);
  }
  const output = lines.join('\n');
  if (level === 'warn') {
    console.warn(output);
  } else {
    console.error(output);
  }
};

export const isDebugEnabled = (): boolean => {
  const flag = process.env['LOGSIFT_DEBUG'];
  return flag !== undefined && flag !== '' && flag !== '0' && flag.toLowerCase() !== 'false';
};
