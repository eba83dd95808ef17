// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * AI-assisted file editing.
 *
 * The model's reply only reaches the disk after file-write cleaning has accepted
 * it. A rejected reply leaves the original file untouched and is shown raw.
 */

import chalk from 'chalk';
import * as path from 'path';
import { formatDiffForTerminal, generateDiff, truncateDiff, type DiffResult } from '../diff.js';
import { describeError, isAbortError, SanitizationRejectedError } from '../errors.js';
import { logger } from '../logger.js';
import { sanitizeForFileWrite } from '../parsing/sanitizer.js';
import { spinner } from '../spinner.js';
import type { SanitizationResult } from '../types.js';
import { readTextFile, writeFileWithBackup, type TextFile } from '../utils/file-io.js';
import type { AssistantContext } from './context.js';
import { buildEditPrompt } from './prompts.js';
import { renderPanel } from './render.js';

export type EditOutcome =
  | { status: 'written'; path: string; backupPath: string | null; diff: DiffResult; result: SanitizationResult }
  | { status: 'unchanged'; path: string; result: SanitizationResult }
  | { status: 'rejected'; path: string; result: SanitizationResult; rawResponse: string }
  | { status: 'failed'; error: unknown }
  | { status: 'cancelled' };

/**
 * Cleaning trims the reply; keep the file's final newline if it had one.
 */
export function withTrailingNewline(cleaned: string, original: string): string {
  const newline = original.endsWith('\r\n') ? '\r\n' : original.endsWith('\n') ? '\n' : '';
  return newline && !cleaned.endsWith('\n') ? cleaned + newline : cleaned;
}

/**
 * Apply a natural-language instruction to a file.
 */
export async function editFile(ctx: AssistantContext, filePath: string, instruction: string): Promise<EditOutcome> {
  let file: TextFile;
  try {
    file = await readTextFile(filePath);
  } catch (error) {
    logger.error(describeError(error));
    return { status: 'failed', error };
  }

  console.log(chalk.yellow.bold(`✏️  Editing ${file.path}...`));
  console.log(chalk.dim(`Instruction: ${instruction}`));

  let raw: string;
  spinner.thinking();
  try {
    raw = await ctx.interrupts.run(signal =>
      ctx.client.complete(
        ctx.model,
        [{ role: 'user', content: buildEditPrompt(file.path, file.content, instruction) }],
        signal
      )
    );
  } catch (error) {
    spinner.stop();
    if (isAbortError(error)) {
      console.log(chalk.magenta('Edit cancelled; file untouched.'));
      return { status: 'cancelled' };
    }
    logger.error(describeError(error));
    return { status: 'failed', error };
  }
  spinner.stop();

  const result = sanitizeForFileWrite(raw, { extension: path.extname(file.path) });
  logger.sanitization(raw.length, result);

  if (!result.valid) {
    console.log(chalk.red(`⚠️  ${describeError(new SanitizationRejectedError(result.reason, raw))}`));
    console.log(chalk.yellow('Raw response for manual review:'));
    console.log(renderPanel('Raw AI Response', raw, 'yellow'));
    return { status: 'rejected', path: file.path, result, rawResponse: raw };
  }

  for (const warning of result.warnings) {
    logger.warn(warning);
  }

  const content = withTrailingNewline(result.content, file.content);
  const diff = generateDiff(file.path, file.content, content);
  if (diff.linesAdded === 0 && diff.linesRemoved === 0) {
    console.log(chalk.dim(`No changes to ${file.path}`));
    return { status: 'unchanged', path: file.path, result };
  }

  console.log(chalk.cyan(`Changes: ${diff.summary}`));
  console.log(formatDiffForTerminal(truncateDiff(diff.unifiedDiff)));

  let backupPath: string | null;
  try {
    backupPath = await writeFileWithBackup(file.path, content, {
      createBackups: ctx.config.createBackups,
      previousContent: file.content,
    });
  } catch (error) {
    logger.error(`Failed to write ${file.path}: ${describeError(error)}`);
    return { status: 'failed', error };
  }

  if (backupPath) {
    console.log(chalk.dim(`Backup created: ${backupPath}`));
  } else {
    console.log(chalk.yellow('⚠️  Backups disabled - no backup created'));
  }
  console.log(chalk.green(`✅ Successfully edited ${file.path}`));
  return { status: 'written', path: file.path, backupPath, diff, result };
}
