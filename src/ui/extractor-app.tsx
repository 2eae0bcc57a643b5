/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import type {
  ExtractionJobObserver,
  ExtractionJobOptions,
  ExtractionJobResult,
} from '../runner/index.js';
import { runExtractionJob } from '../runner/index.js';
import type { TemplateDescriptor } from '../types/index.js';

interface Stats {
  processed: number;
  matched: number;
}

interface AppState {
  template?: TemplateDescriptor;
  score?: string;
  stats: Stats;
  lastEvent: string;
}

const initialState: AppState = {
  stats: { processed: 0, matched: 0 },
  lastEvent: 'Initializing...',
};

export interface ExtractorAppProps {
  options: ExtractionJobOptions;
}

export const ExtractorApp: React.FC<ExtractorAppProps> = ({ options }) => {
  const [state, setState] = useState<AppState>(initialState);
  const [result, setResult] = useState<ExtractionJobResult | undefined>();
  const [error, setError] = useState<string | undefined>();
  const { exit } = useApp();

  useEffect(() => {
    let cancelled = false;

    const observer: ExtractionJobObserver = {
      onTemplate: ({ template, suggestion }) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          template,
          score: suggestion
            ? suggestion.scored
              ? `${suggestion.score}/${suggestion.sampleSize} sample lines`
              : 'fallback (unscored)'
            : undefined,
          lastEvent: suggestion ? `Suggested: ${template.description}` : 'Using supplied template',
        }));
      },

      onProgress: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          stats: { processed: info.processed, matched: info.matched },
          lastEvent: `Processed ${info.processed} line(s)`,
        }));
      },
    };

    runExtractionJob({ ...options, observer })
      .then((res) => {
        if (cancelled) return;
        setResult(res);
        if (!res.run.ok) {
          setError(res.run.error.message);
        } else if (res.reportError !== undefined) {
          setError(res.reportError);
        }
      })
      .catch((err) => {
        if (cancelled) return;
        setError(err instanceof Error ? err.message : String(err));
      });

    return () => {
      cancelled = true;
    };
  }, [options]);

  useEffect(() => {
    if (result || error) {
      const timer = setTimeout(() => exit(error ? new Error(error) : undefined), 200);
      return () => clearTimeout(timer);
    }
    return undefined;
  }, [result, error, exit]);

  const matchPercent = calculateMatchRate(state.stats);
  const progressBar = renderBar(matchPercent, 30);
  const run = result?.run;

  return (
    <Box flexDirection="column">
      <Box borderStyle="round" borderColor="cyan" paddingX={1}>
        <Text bold color="cyanBright">
          LOGSIFT
        </Text>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="gray" flexDirection="column" paddingX={1} paddingY={0}>
        <Box>
          <Text dimColor>Template: </Text>
          <Text color="cyan">{state.template?.pattern ?? '...'}</Text>
          {state.score && <Text dimColor> ({state.score})</Text>}
        </Box>
        <Box>
          <Text dimColor>Fields: </Text>
          <Text>{state.template?.field_names.join(', ') || 'derived from template'}</Text>
          <Text dimColor> | Mode: </Text>
          <Text>{options.discipline}</Text>
        </Box>
        <Box>
          <Text dimColor>Lines: </Text>
          <Text>{state.stats.processed}</Text>
          <Text dimColor> | Matched: </Text>
          <Text color="greenBright">{state.stats.matched}</Text>
          <Text dimColor> | Unmatched: </Text>
          <Text color="yellow">{state.stats.processed - state.stats.matched}</Text>
        </Box>
        <Box>
          <Text dimColor>Match rate: </Text>
          <Text color="greenBright">{progressBar}</Text>
          <Text color="white"> {matchPercent}%</Text>
        </Box>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="magenta" paddingX={1} paddingY={0}>
        <Text bold color="magenta">
          Activity:{' '}
        </Text>
        <Text>{state.lastEvent}</Text>
      </Box>

      {result && run?.ok && (
        <Box marginTop={1} borderStyle="double" borderColor="greenBright" flexDirection="column" paddingX={1} paddingY={0}>
          <Text bold color="greenBright">
            ✓ COMPLETE
          </Text>
          <Text>
            Processed {run.totalLines} lines | Matched {run.matchedLines} | Records {run.records.length}
          </Text>
          {options.filter && (
            <Text>
              Filter "{options.filter.query}"{options.filter.invert ? ' (inverted)' : ''}: {result.records.length} record(s)
            </Text>
          )}
          {result.records.slice(0, 5).map((record) => (
            <Text key={record.lineNumber} dimColor={!record.matched}>
              #{record.lineNumber} {record.fieldOrder.map((name) => `${name}=${record.fields[name] ?? ''}`).join(' | ')}
            </Text>
          ))}
          {result.summary && (
            <Box flexDirection="column" marginTop={1}>
              <Text bold>Values of {options.summaryField}:</Text>
              {result.summary.slice(0, 10).map((entry) => (
                <Text key={entry.value}>
                  {'  '}
                  {entry.value.padEnd(20)} {entry.count}
                </Text>
              ))}
            </Box>
          )}
          {result.reportPath && <Text dimColor>Report: {result.reportPath}</Text>}
        </Box>
      )}

      {error && (
        <Box marginTop={1} borderStyle="bold" borderColor="red" paddingX={1} paddingY={0}>
          <Text color="redBright">ERROR: {error}</Text>
        </Box>
      )}
    </Box>
  );
};

function calculateMatchRate(stats: Stats): number {
  if (stats.processed === 0) return 0;
  return Math.round((stats.matched / stats.processed) * 100);
}

function renderBar(percent: number, width: number): string {
  const filled = Math.round((percent / 100) * width);
  const empty = width - filled;
  return '█'.repeat(filled) + '░'.repeat(empty);
}
