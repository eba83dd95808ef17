// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Text file access for analysis and editing.
 */

import type { Stats } from 'node:fs';
import { readdir, readFile, stat, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { FileUnreadableError, type FileUnreadableReason } from '../errors.js';
import { logger } from '../logger.js';

const MAX_SUGGESTIONS = 5;

export interface TextFile {
  /** Path actually read; differs from the request after a case-insensitive match */
  path: string;
  content: string;
  matchedCaseInsensitively: boolean;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function reasonFor(error: unknown): FileUnreadableReason {
  switch (errorCode(error)) {
    case 'ENOENT':
      return 'missing';
    case 'EACCES':
    case 'EPERM':
      return 'permission';
    case 'EISDIR':
      return 'not-a-file';
    default:
      return 'unknown';
  }
}

/**
 * Decode bytes as UTF-8, rejecting invalid sequences instead of replacing them.
 */
export function decodeUtf8Strict(buffer: Uint8Array): string | null {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    return null;
  }
}

async function listFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter(entry => entry.isFile()).map(entry => entry.name);
  } catch (error) {
    logger.debug(`Cannot list ${dir}: ${error instanceof Error ? error.message : String(error)}`);
    return [];
  }
}

/**
 * Look for a file whose name matches case-insensitively in the same directory.
 * When none does, return up to five names containing the requested one.
 */
export async function findFileCaseInsensitive(
  filePath: string
): Promise<{ match: string | null; suggestions: string[] }> {
  const dir = path.dirname(filePath);
  const target = path.basename(filePath).toLowerCase();
  const names = await listFiles(dir);

  const exact = names.find(name => name.toLowerCase() === target);
  if (exact) {
    return { match: path.join(dir, exact), suggestions: [] };
  }

  const suggestions = names
    .filter(name => name.toLowerCase().includes(target))
    .slice(0, MAX_SUGGESTIONS);
  return { match: null, suggestions };
}

async function readStrict(filePath: string): Promise<string> {
  let info: Stats;
  try {
    info = await stat(filePath);
  } catch (error) {
    throw new FileUnreadableError(filePath, reasonFor(error));
  }
  if (!info.isFile()) {
    throw new FileUnreadableError(filePath, 'not-a-file');
  }

  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    throw new FileUnreadableError(filePath, reasonFor(error));
  }

  const content = decodeUtf8Strict(buffer);
  if (content === null) {
    throw new FileUnreadableError(filePath, 'encoding');
  }
  return content;
}

/**
 * Read a UTF-8 text file, falling back to a case-insensitive name match.
 */
export async function readTextFile(filePath: string): Promise<TextFile> {
  try {
    return { path: filePath, content: await readStrict(filePath), matchedCaseInsensitively: false };
  } catch (error) {
    if (!(error instanceof FileUnreadableError) || error.reason !== 'missing') {
      throw error;
    }
  }

  const { match, suggestions } = await findFileCaseInsensitive(filePath);
  if (match) {
    logger.verbose(`Using ${match} for ${filePath}`);
    return { path: match, content: await readStrict(match), matchedCaseInsensitively: true };
  }

  throw new FileUnreadableError(
    filePath,
    'missing',
    suggestions.length > 0 ? [`Did you mean: ${suggestions.join(', ')}`] : []
  );
}

export function backupPathFor(filePath: string): string {
  return `${filePath}.backup`;
}

/**
 * Write new content, first saving the previous content beside it.
 * Returns the backup path, or null when no backup was made.
 */
export async function writeFileWithBackup(
  filePath: string,
  content: string,
  options: { createBackups: boolean; previousContent?: string }
): Promise<string | null> {
  let backupPath: string | null = null;

  if (options.createBackups) {
    const previous = options.previousContent ?? (await readFile(filePath, 'utf-8'));
    backupPath = backupPathFor(filePath);
    await writeFile(backupPath, previous, 'utf-8');
    logger.verbose(`Backup written to ${backupPath}`);
  }

  await writeFile(filePath, content, 'utf-8');
  return backupPath;
}
