// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Terminal presentation: titled panels, file info and previews.
 */

import chalk from 'chalk';
import * as path from 'path';
import type { ResponseParser } from '../parsing/response-parser.js';
import { cleanForDisplay } from '../parsing/sanitizer.js';

export type PanelColor = 'blue' | 'green' | 'yellow' | 'red' | 'cyan' | 'magenta';

const RULE_WIDTH = 60;

/**
 * Frame a block of text with a colored title rule and a closing rule.
 */
export function renderPanel(title: string, body: string, color: PanelColor = 'blue'): string {
  const paint = chalk[color];
  const heading = `── ${title} `;
  const top = paint.bold(heading + '─'.repeat(Math.max(0, RULE_WIDTH - heading.length)));
  const bottom = paint('─'.repeat(RULE_WIDTH));
  return `${top}\n${body}\n${bottom}`;
}

/**
 * Number of lines, not counting a trailing newline.
 */
export function countLines(content: string): number {
  if (content === '') return 0;
  const lines = content.split(/\r?\n/);
  return content.endsWith('\n') ? lines.length - 1 : lines.length;
}

export function renderFileInfo(filePath: string, content: string): string {
  const body = [
    `${chalk.bold('File:')} ${path.basename(filePath)}`,
    `${chalk.bold('Size:')} ${content.length} characters`,
    `${chalk.bold('Lines:')} ${countLines(content)}`,
  ].join('\n');
  return renderPanel('📁 File Info', body, 'blue');
}

/**
 * Line-numbered preview, or null when the file is at or above the threshold.
 */
export function renderPreview(filePath: string, content: string, threshold: number): string | null {
  if (content.length >= threshold) {
    return null;
  }
  const lines = content.replace(/\r?\n$/, '').split(/\r?\n/);
  const width = String(lines.length).length;
  const body = lines.map((line, i) => `${chalk.dim(String(i + 1).padStart(width))}  ${line}`).join('\n');
  return renderPanel(`📄 ${path.basename(filePath)}`, body, 'green');
}

/**
 * Parse a raw model reply and render its display form in a panel.
 */
export function renderResponse(
  raw: string,
  parser: ResponseParser,
  options: { title: string; color?: PanelColor; showThoughts?: boolean }
): string {
  const display = cleanForDisplay(parser.parse(raw), { showThoughts: options.showThoughts });
  return renderPanel(options.title, display, options.color);
}
