// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Change previews shown before an edited file is written.
 */
import { createTwoFilesPatch, structuredPatch } from 'diff';
import chalk from 'chalk';

export interface DiffResult {
  /** Unified diff string */
  unifiedDiff: string;
  linesAdded: number;
  linesRemoved: number;
  isNewFile: boolean;
  /** One-line summary such as "-2, +5 lines" */
  summary: string;
}

/**
 * Diff two strings.
 */
export function generateDiff(
  filePath: string,
  oldContent: string,
  newContent: string,
  isNewFile: boolean = false
): DiffResult {
  const unifiedDiff = createTwoFilesPatch(
    isNewFile ? '/dev/null' : `a/${filePath}`,
    `b/${filePath}`,
    oldContent,
    newContent,
    isNewFile ? '' : 'original',
    'edited',
    { context: 3 }
  );

  const patch = structuredPatch(filePath, filePath, oldContent, newContent, '', '', { context: 3 });

  let linesAdded = 0;
  let linesRemoved = 0;
  for (const hunk of patch.hunks) {
    for (const line of hunk.lines) {
      if (line.startsWith('+')) {
        linesAdded++;
      } else if (line.startsWith('-')) {
        linesRemoved++;
      }
    }
  }

  let summary: string;
  if (isNewFile) {
    summary = `New file: ${linesAdded} lines`;
  } else if (linesAdded === 0 && linesRemoved === 0) {
    summary = 'No changes';
  } else {
    const parts: string[] = [];
    if (linesRemoved > 0) parts.push(`-${linesRemoved}`);
    if (linesAdded > 0) parts.push(`+${linesAdded}`);
    summary = `${parts.join(', ')} lines`;
  }

  return { unifiedDiff, linesAdded, linesRemoved, isNewFile, summary };
}

/**
 * Colorize a unified diff for the terminal.
 */
export function formatDiffForTerminal(diff: string): string {
  return diff
    .split('\n')
    .map(line => {
      if (line.startsWith('+++') || line.startsWith('---')) return chalk.dim(line);
      if (line.startsWith('@@')) return chalk.cyan(line);
      if (line.startsWith('+')) return chalk.green(line);
      if (line.startsWith('-')) return chalk.red(line);
      return line;
    })
    .join('\n');
}

/**
 * Keep the head and tail of a long diff, eliding the middle.
 */
export function truncateDiff(diff: string, maxLines: number = 30): string {
  const lines = diff.split('\n');
  if (lines.length <= maxLines) {
    return diff;
  }

  const headerLines = lines.filter(line => line.startsWith('---') || line.startsWith('+++') || line.startsWith('==='));
  const contentLines = lines.filter(line => !headerLines.includes(line));

  const available = maxLines - headerLines.length - 1;
  const half = Math.floor(available / 2);
  if (contentLines.length <= available) {
    return diff;
  }

  const hiddenCount = contentLines.length - half * 2;
  return [
    ...headerLines,
    ...contentLines.slice(0, half),
    `... ${hiddenCount} more lines ...`,
    ...contentLines.slice(-half),
  ].join('\n');
}
