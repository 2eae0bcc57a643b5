/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types/index.js';
export * from './core/index.js';
export {
  openCatalogStore,
  FileCatalogStore,
  SqliteCatalogStore,
  formatRecordsReport,
  writeRecordsReport,
  toWireRecord,
  type ReportFormat,
  type WireRecord,
} from './tools/index.js';
export * from './runner/index.js';
export { resolveExtractorConfigFromEnv, DEFAULT_CATALOG_PATH } from './config/extractor-config.js';
export { main as runCli } from './cli/main.js';
