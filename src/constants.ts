// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized constants for termsage.
 * Pattern tables are hand-curated; keep them literal rather than generalizing.
 */

/**
 * Line marker a model uses to declare a command it wants executed.
 */
export const COMMAND_MARKER = 'EXECUTE_COMMAND:';

/**
 * Dangerous shell command patterns.
 * Every match adds its description as a warning and marks the command destructive.
 */
export interface DangerousPattern {
  pattern: RegExp;
  description: string;
}

export const DANGEROUS_COMMAND_PATTERNS: DangerousPattern[] = [
  { pattern: /rm -rf/i, description: 'recursive force delete (rm -rf)' },
  { pattern: /dd if=/i, description: 'raw disk copy (dd if=)' },
  { pattern: /mkfs/i, description: 'formats a filesystem (mkfs)' },
  { pattern: />\s*\/dev\//i, description: 'redirects output into a device under /dev/' },
  { pattern: /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/, description: 'fork bomb' },
];

/**
 * A lone `>` redirection (not `>>`).
 */
export const OVERWRITE_REDIRECT = /(^|[^>])>(?!>)/;

export const OVERWRITE_WARNING = 'will overwrite existing file (> redirection)';

/**
 * Thought wrapper tags stripped before any file write, regardless of model family.
 */
export const THOUGHT_WRAPPER_TAGS = [
  'thinking',
  'thoughts',
  'reasoning',
  'reflection',
  'planning',
  'analysis',
] as const;

/**
 * Tag names whose `<tag>...</tag>` spans are hidden from a token stream.
 */
export const STREAM_THOUGHT_TAGS = ['thought', ...THOUGHT_WRAPPER_TAGS] as const;

/**
 * Structural keywords per source extension.
 * Absence only produces an advisory warning.
 */
export const CODE_KEYWORDS: Record<string, { language: string; keywords: string[] }> = {
  '.py': { language: 'Python', keywords: ['def ', 'class ', 'import '] },
  '.js': { language: 'JavaScript', keywords: ['function', 'const ', 'let ', 'var ', 'class ', 'import ', '=>'] },
  '.ts': { language: 'TypeScript', keywords: ['function', 'const ', 'let ', 'class ', 'import ', 'export ', 'interface ', 'type '] },
  '.java': { language: 'Java', keywords: ['class ', 'interface ', 'public ', 'private ', 'import '] },
  '.cpp': { language: 'C++', keywords: ['#include', 'int ', 'void ', 'class ', 'return'] },
  '.c': { language: 'C', keywords: ['#include', 'int ', 'void ', 'return'] },
  '.go': { language: 'Go', keywords: ['package ', 'func ', 'import '] },
  '.rs': { language: 'Rust', keywords: ['fn ', 'use ', 'struct ', 'impl ', 'let '] },
};

/**
 * File-write validation thresholds.
 */
export const SANITIZE_CONFIG = {
  /** Cleaned content shorter than this is treated as empty */
  MIN_CONTENT_LENGTH: 10,
  /** Cleaned/raw length ratio below this is treated as over-cleaned */
  MIN_RETAINED_RATIO: 0.1,
  /** Keyword warnings are only raised above this length */
  KEYWORD_CHECK_MIN_LENGTH: 50,
} as const;

/**
 * Command execution configuration.
 */
export const COMMAND_CONFIG = {
  /** Default timeout in seconds */
  TIMEOUT_SECONDS: 30,
  /** Maximum captured output before the child is killed */
  MAX_BUFFER: 10 * 1024 * 1024,
} as const;

export const DEFAULT_ELEVATION_PREFIXES = ['sudo', 'su'];

export const DEFAULT_EXIT_KEYWORDS = ['exit', 'quit', 'bye', 'goodbye'];

/**
 * Loading messages shown while waiting on the model.
 */
export const THINKING_MESSAGES = [
  'Thinking...',
  'Processing...',
  'Contemplating...',
  'Analyzing...',
  'Examining...',
  'Computing...',
  'Working on it...',
  'Crafting response...',
  'Generating answer...',
];
