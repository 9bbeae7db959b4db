/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React, { useEffect } from 'react';
import { Box, Text, render, useApp } from 'ink';
import type { NormalizeRunResult } from '../types/index.js';
import { buildSummaryRows, type SummaryRow } from './summary-rows.js';

export interface NormalizeSummaryProps {
  result: NormalizeRunResult;
}

const toneColor = (tone: SummaryRow['tone']): string | undefined => {
  if (tone === 'good') return 'greenBright';
  if (tone === 'warn') return 'yellow';
  return undefined;
};

export const NormalizeSummary: React.FC<NormalizeSummaryProps> = ({ result }) => {
  const { exit } = useApp();
  const rows = buildSummaryRows(result);
  const width = rows.reduce((max, row) => Math.max(max, row.label.length), 0);

  useEffect(() => {
    exit();
  }, [exit]);

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1}>
      <Text bold color="cyanBright">
        RACE NORMALIZER
      </Text>
      {rows.map((row) => (
        <Box key={row.label}>
          <Text dimColor>{row.label.padEnd(width)} </Text>
          <Text color={toneColor(row.tone)}>{row.value}</Text>
        </Box>
      ))}
    </Box>
  );
};

/**
 * Renders the panel once to stderr, leaving stdout to the records.
 */
export async function renderNormalizeSummary(result: NormalizeRunResult): Promise<void> {
  const { waitUntilExit } = render(<NormalizeSummary result={result} />, {
    stdout: process.stderr,
    patchConsole: false,
  });
  await waitUntilExit();
}

/**
 * Renders the panel after a successful run when the summary switch is on.
 * Returns whether anything was rendered.
 */
export async function renderSummaryIfEnabled(
  result: NormalizeRunResult | undefined,
  enabled: boolean,
  renderSummary: (result: NormalizeRunResult) => Promise<void> = renderNormalizeSummary,
): Promise<boolean> {
  if (!enabled || !result) {
    return false;
  }
  await renderSummary(result);
  return true;
}
