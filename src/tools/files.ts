/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';

export const ensureDirectory = async (dirPath: string): Promise<void> => {
  await fs.mkdir(dirPath, { recursive: true });
};

export const writeJsonFile = async (filePath: string, data: unknown): Promise<void> => {
  await ensureDirectory(dirname(filePath));
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf8');
};

export const writeTextFile = async (filePath: string, content: string): Promise<void> => {
  await ensureDirectory(dirname(filePath));
  await fs.writeFile(filePath, content, 'utf8');
};

export const readJsonFile = async (filePath: string): Promise<unknown> => {
  const buffer = await fs.readFile(filePath, 'utf8');
  return JSON.parse(buffer);
};

export const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
};
