/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import prompts from 'prompts';
import { isCommandName, splitList, type RunnerOptions } from './args.js';
import { REPORT_FORMATS } from '../tools/report-writer.js';

export async function runInteractiveSetup(options: RunnerOptions): Promise<void> {
  const responses = await prompts(
    [
      {
        type: options.command ? null : 'select',
        name: 'command',
        message: 'What do you want to do?',
        choices: [
          { title: 'Extract fields from a log file', value: 'extract' },
          { title: 'Suggest a template for a log file', value: 'suggest' },
          { title: 'Test a template on the first line', value: 'test' },
        ],
        initial: 0,
      },
      {
        type: 'text',
        name: 'inputPath',
        message: 'Path to the log file',
        initial: options.inputPath,
      },
      {
        type: (_prev, values) => ((values.command ?? options.command) === 'suggest' ? null : 'text'),
        name: 'pattern',
        message: 'Extraction template (leave empty to use the suggested one)',
        initial: options.pattern ?? '',
      },
      {
        type: (_prev, values) =>
          values.pattern || options.pattern ? 'text' : null,
        name: 'fieldNames',
        message: 'Field names, comma-separated (leave empty to derive them from the template)',
        initial: options.fieldNames?.join(', ') ?? '',
      },
      {
        type: (_prev, values) => ((values.command ?? options.command) === 'extract' ? 'toggle' : null),
        name: 'bestEffort',
        message: 'Keep lines that do not match (best-effort)?',
        initial: options.bestEffort ?? false,
        active: 'yes',
        inactive: 'no',
      },
      {
        type: (_prev, values) => ((values.command ?? options.command) === 'extract' ? 'text' : null),
        name: 'outputPath',
        message: 'Write records to (leave empty to skip)',
        initial: options.outputPath ?? '',
      },
      {
        type: (_prev, values) => (values.outputPath ? 'select' : null),
        name: 'format',
        message: 'Report format',
        choices: REPORT_FORMATS.map((format) => ({ title: format.toUpperCase(), value: format })),
        initial: 0,
      },
    ],
    {
      onCancel: () => {
        console.error('Interactive setup cancelled.');
        process.exit(1);
      },
    },
  );

  if (typeof responses.command === 'string' && isCommandName(responses.command)) {
    options.command = responses.command;
  }
  if (typeof responses.inputPath === 'string' && responses.inputPath.trim()) {
    options.inputPath = responses.inputPath.trim();
  }
  if (typeof responses.pattern === 'string' && responses.pattern.trim()) {
    options.pattern = responses.pattern.trim();
  }
  if (typeof responses.fieldNames === 'string') {
    const names = splitList(responses.fieldNames);
    options.fieldNames = names.length > 0 ? names : undefined;
  }
  if (typeof responses.bestEffort === 'boolean') {
    options.bestEffort = responses.bestEffort;
  }
  if (typeof responses.outputPath === 'string' && responses.outputPath.trim()) {
    options.outputPath = resolve(responses.outputPath.trim());
  }
  if (REPORT_FORMATS.some((format) => format === responses.format)) {
    options.format = responses.format;
  }
}
