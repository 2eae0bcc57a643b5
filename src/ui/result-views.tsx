/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { SuggestedTemplate } from '../core/suggestion/suggestion-engine.js';
import type { LinePreview } from '../core/analysis/line-preview.js';

export interface SuggestionViewProps {
  suggestion: SuggestedTemplate;
  catalogSource: string;
}

export const SuggestionView: React.FC<SuggestionViewProps> = ({ suggestion, catalogSource }) => (
  <Box flexDirection="column">
    <Box borderStyle="double" borderColor="greenBright" flexDirection="column" paddingX={1}>
      <Text bold color="greenBright">
        SUGGESTED TEMPLATE
      </Text>
      <Text>
        Pattern: <Text color="cyan">{suggestion.template.pattern}</Text>
      </Text>
      <Text>Description: {suggestion.template.description || '(none)'}</Text>
      <Text>Fields: {suggestion.template.field_names.join(', ')}</Text>
      <Text dimColor>
        {suggestion.scored
          ? `Matched ${suggestion.score} of ${suggestion.sampleSize} sample line(s)`
          : 'Fallback template (not scored)'}
      </Text>
    </Box>
    {suggestion.candidates.length > 0 && (
      <Box marginTop={1} borderStyle="single" borderColor="gray" flexDirection="column" paddingX={1}>
        <Text dimColor>Catalog: {catalogSource}</Text>
        {suggestion.candidates.map((candidate) => (
          <Text key={candidate.position} color={candidate.error ? 'red' : undefined}>
            {String(candidate.position + 1).padStart(3)}.{' '}
            {candidate.error
              ? `invalid: ${candidate.error}`
              : `${candidate.score}/${suggestion.sampleSize} (${candidate.fieldCount} fields)`}{' '}
            {candidate.description}
          </Text>
        ))}
      </Box>
    )}
  </Box>
);

export interface PreviewViewProps {
  line: string;
  preview: LinePreview;
}

export const PreviewView: React.FC<PreviewViewProps> = ({ line, preview }) => (
  <Box borderStyle="single" borderColor={preview.ok ? 'green' : 'red'} flexDirection="column" paddingX={1}>
    <Text dimColor>Line: {line}</Text>
    {preview.ok ? (
      preview.fieldOrder.map((name) => (
        <Text key={name}>
          <Text color="cyan">{name}</Text> = {preview.fields[name] ?? ''}
        </Text>
      ))
    ) : (
      <Text color="redBright">Error: {preview.reason}</Text>
    )}
  </Box>
);
