// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Command extraction and risk classification.
 * Only `EXECUTE_COMMAND:` lines are candidates for execution.
 */

import {
  COMMAND_MARKER,
  DANGEROUS_COMMAND_PATTERNS,
  DEFAULT_ELEVATION_PREFIXES,
  OVERWRITE_REDIRECT,
  OVERWRITE_WARNING,
  type DangerousPattern,
} from '../constants.js';
import type { CommandCandidate } from '../types.js';

/**
 * Extract command strings from response text.
 * Order and duplicates are preserved.
 */
export function extractCommands(text: string): string[] {
  if (!text.includes(COMMAND_MARKER)) {
    return [];
  }

  const commands: string[] = [];
  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.startsWith(COMMAND_MARKER)) {
      const command = trimmed.slice(COMMAND_MARKER.length).trim();
      if (command) {
        commands.push(command);
      }
    }
  }
  return commands;
}

/**
 * Check whether a command starts with an elevation prefix.
 */
export function requiresElevation(
  command: string,
  elevationPrefixes: readonly string[] = DEFAULT_ELEVATION_PREFIXES
): boolean {
  const trimmed = command.trim();
  return elevationPrefixes.some(prefix => prefix.length > 0 && trimmed.startsWith(prefix));
}

/**
 * Descriptions of every dangerous pattern the command matches.
 */
export function findDangerousPatterns(
  command: string,
  patterns: readonly DangerousPattern[] = DANGEROUS_COMMAND_PATTERNS
): string[] {
  return patterns.filter(({ pattern }) => pattern.test(command)).map(({ description }) => description);
}

/**
 * Classify a single command. Each check runs independently.
 */
export function classifyCommand(
  command: string,
  elevationPrefixes: readonly string[] = DEFAULT_ELEVATION_PREFIXES
): CommandCandidate {
  const dangers = findDangerousPatterns(command);
  const warnings = dangers.map(description => `Dangerous: ${description}`);

  if (OVERWRITE_REDIRECT.test(command)) {
    warnings.push(OVERWRITE_WARNING);
  }

  return {
    text: command,
    requiresElevation: requiresElevation(command, elevationPrefixes),
    warnings,
    destructive: dangers.length > 0,
  };
}

/**
 * Extract and classify all command candidates in a response.
 */
export function extractCandidates(
  text: string,
  elevationPrefixes: readonly string[] = DEFAULT_ELEVATION_PREFIXES
): CommandCandidate[] {
  return extractCommands(text).map(command => classifyCommand(command, elevationPrefixes));
}
