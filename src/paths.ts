// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized path management.
 *
 * Every path under ~/.termsage is computed at call time so tests can redirect
 * the home directory through TERMSAGE_HOME.
 */

import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the base directory (~/.termsage, or TERMSAGE_HOME when set).
 */
export function getTermsageHome(): string {
  if (process.env.TERMSAGE_HOME) {
    return process.env.TERMSAGE_HOME;
  }
  return join(homedir(), '.termsage');
}

export const TermsagePaths = {
  home: (): string => getTermsageHome(),

  /**
   * Global (per-user) configuration file
   */
  globalConfig: (): string => join(getTermsageHome(), 'config.json'),

  /**
   * Workspace configuration file, relative to the given directory
   */
  workspaceConfig: (cwd: string = process.cwd()): string => join(cwd, '.termsage.json'),
} as const;

/**
 * Ensure a directory exists, creating parents as needed.
 */
export function ensureDir(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}
