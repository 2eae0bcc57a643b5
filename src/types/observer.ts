/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Extraction observer interface consumed by the ink application.
 */

export interface ExtractionProgress {
  processed: number;
  matched: number;
}

export interface ExtractionObserver {
  onProgress?(info: ExtractionProgress): void;
}
