/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import type { FallbackShape } from '../core/extraction/extraction-engine.js';
import { REPORT_FORMATS, type ReportFormat } from '../tools/report-writer.js';

export const COMMANDS = ['suggest', 'extract', 'test', 'save-template'] as const;

export type CommandName = (typeof COMMANDS)[number];

export interface RunnerOptions {
  command?: CommandName;
  inputPath: string;
  catalogPath?: string;
  pattern?: string;
  fieldNames?: string[];
  regex?: boolean;
  bestEffort?: boolean;
  fallback?: FallbackShape;
  json?: boolean;
  outputPath?: string;
  format?: ReportFormat;
  columns?: string[];
  filter?: string;
  invert?: boolean;
  summaryField?: string;
  line?: string;
  description?: string;
  interactive?: boolean;
}

export const parseArgs = (argv: string[]): RunnerOptions => {
  const options: RunnerOptions = {
    inputPath: '',
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = (): string => {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(`Missing value for ${arg}.`);
      }
      i += 1;
      return value;
    };

    switch (arg) {
      case '--input':
      case '-i':
        options.inputPath = next();
        break;
      case '--catalog':
      case '-c':
        options.catalogPath = resolve(next());
        break;
      case '--pattern':
      case '-p':
        options.pattern = next();
        break;
      case '--fields':
      case '-f':
        options.fieldNames = splitList(next());
        break;
      case '--regex':
        options.regex = true;
        break;
      case '--best-effort':
        options.bestEffort = true;
        break;
      case '--fallback':
        options.fallback = parseFallback(next());
        break;
      case '--json':
        options.json = true;
        break;
      case '--output':
      case '-o':
        options.outputPath = resolve(next());
        break;
      case '--format':
        options.format = parseFormat(next());
        break;
      case '--columns':
        options.columns = splitList(next());
        break;
      case '--filter':
        options.filter = next();
        break;
      case '--invert':
        options.invert = true;
        break;
      case '--summary':
        options.summaryField = next();
        break;
      case '--line':
        options.line = next();
        break;
      case '--description':
      case '-d':
        options.description = next();
        break;
      case '--interactive':
        options.interactive = true;
        break;
      default:
        if (options.command === undefined && isCommandName(arg)) {
          options.command = arg;
          break;
        }
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
};

export const splitList = (value: string): string[] =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

export const isCommandName = (value: string): value is CommandName =>
  COMMANDS.some((command) => command === value);

const parseFallback = (value: string): FallbackShape => {
  if (value === 'catch-all' || value === 'full-line') {
    return value;
  }
  throw new Error(`Unknown fallback shape: ${value} (expected catch-all or full-line).`);
};

const parseFormat = (value: string): ReportFormat => {
  const format = REPORT_FORMATS.find((candidate) => candidate === value.toLowerCase());
  if (!format) {
    throw new Error(`Unknown report format: ${value} (expected ${REPORT_FORMATS.join(', ')}).`);
  }
  return format;
};
