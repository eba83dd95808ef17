// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Content Sanitizer
 *
 * Derives deliverable content from raw model output for two consumers:
 * - display: human-readable, thoughts optional, command markers dropped
 * - file write: byte-exact replacement content, validated before use
 *
 * File-write cleaning is a fixed pipeline of pure stages. Order matters:
 * thought stripping precedes fence unwrapping, which precedes lead-in stripping.
 */

import { CODE_KEYWORDS, SANITIZE_CONFIG, THOUGHT_WRAPPER_TAGS } from '../constants.js';
import type { ResponseSegment, SanitizationResult } from '../types.js';

// ============================================
// Display cleaning
// ============================================

export interface DisplayOptions {
  showThoughts?: boolean;
}

/**
 * Render segments for display, in order, joined by blank lines.
 */
export function cleanForDisplay(segments: readonly ResponseSegment[], options: DisplayOptions = {}): string {
  const parts: string[] = [];

  for (const seg of segments) {
    switch (seg.kind) {
      case 'command':
        break;
      case 'thought':
        if (options.showThoughts) {
          parts.push(seg.content);
        }
        break;
      case 'code':
        parts.push(`\`\`\`${seg.metadata.language ?? 'text'}\n${seg.content}\n\`\`\``);
        break;
      case 'text':
        parts.push(seg.content);
        break;
    }
  }

  return parts.join('\n\n');
}

// ============================================
// File-write cleaning stages
// ============================================

/**
 * A single pure cleaning stage.
 */
export type CleaningStage = (text: string) => string;

const THOUGHT_WRAPPERS = THOUGHT_WRAPPER_TAGS.map(
  tag => new RegExp(`<${tag}>[\\s\\S]*?</${tag}>`, 'gi')
);

const LEAD_IN_PATTERNS: RegExp[] = [
  /^Here['’]s the .*?:\n+/gim,
  /^Here is the .*?:\n+/gim,
  /^Modified content:\n+/gim,
  /^Updated file:\n+/gim,
  /^Fixed version:\n+/gim,
  /^Edited content:\n+/gim,
  /^The following.*?:\n+/gim,
  /^Below is.*?:\n+/gim,
];

const SEPARATOR_LINE = /^[ \t]*-{3,}[ \t]*$/gm;

const TRAILING_EXPLANATION = /\n\n(This\s|The\s+above|I['’]ve\s|Note\s|Notice|Explanation:|Changes:)/i;

/**
 * Remove all known thought wrappers, whatever the model family.
 */
export const stripThoughtWrappers: CleaningStage = text =>
  THOUGHT_WRAPPERS.reduce((acc, pattern) => acc.replace(pattern, ''), text);

/**
 * Replace fenced code blocks with their inner content.
 * Language-tagged fences first, then bare ones.
 */
export const unwrapCodeFences: CleaningStage = text =>
  text
    .replace(/```\w*\n([\s\S]*?)```/g, (_match, inner: string) => inner)
    .replace(/```\n?([\s\S]*?)```/g, (_match, inner: string) => inner);

/**
 * Remove boilerplate lead-in lines and blank out separator lines.
 * Separators keep their line break so a following explanation still sits after a blank line.
 */
export const stripLeadInLines: CleaningStage = text =>
  LEAD_IN_PATTERNS
    .reduce((acc, pattern) => acc.replace(pattern, ''), text)
    .replace(SEPARATOR_LINE, '');

/**
 * Cut everything from the first explanation cue that follows a blank line.
 */
export const truncateTrailingExplanation: CleaningStage = text => {
  const match = TRAILING_EXPLANATION.exec(text);
  return match ? text.slice(0, match.index) : text;
};

/**
 * Collapse runs of 3+ newlines to 2 and trim.
 */
export const collapseBlankLines: CleaningStage = text => text.replace(/\n{3,}/g, '\n\n').trim();

/**
 * Stages in application order.
 */
export const FILE_WRITE_PIPELINE: readonly CleaningStage[] = [
  stripThoughtWrappers,
  unwrapCodeFences,
  stripLeadInLines,
  truncateTrailingExplanation,
  collapseBlankLines,
];

/**
 * Run the file-write pipeline without validation.
 */
export function cleanForFileWrite(raw: string): string {
  return FILE_WRITE_PIPELINE.reduce((acc, stage) => stage(acc), raw);
}

// ============================================
// Validation
// ============================================

export const REJECT_EMPTY = 'Content appears to be effectively empty after cleaning';
export const REJECT_OVER_CLEANED =
  'Content was over-cleaned: reduced by more than 90%, likely stripped real content';
export const VALIDATED = 'Content validated successfully';

/**
 * Validate cleaned content against the raw response it came from.
 * @param extension - Target file extension including the dot, e.g. ".py"
 */
export function validateCleanedContent(
  original: string,
  cleaned: string,
  extension: string = ''
): SanitizationResult {
  if (!cleaned || cleaned.length < SANITIZE_CONFIG.MIN_CONTENT_LENGTH) {
    return { valid: false, content: cleaned, reason: REJECT_EMPTY, warnings: [] };
  }

  if (cleaned.length < original.length * SANITIZE_CONFIG.MIN_RETAINED_RATIO) {
    return { valid: false, content: cleaned, reason: REJECT_OVER_CLEANED, warnings: [] };
  }

  const warnings: string[] = [];
  const expected = CODE_KEYWORDS[extension.toLowerCase()];
  if (
    expected &&
    cleaned.length > SANITIZE_CONFIG.KEYWORD_CHECK_MIN_LENGTH &&
    !expected.keywords.some(keyword => cleaned.includes(keyword))
  ) {
    warnings.push(`No ${expected.language} keywords found in cleaned content`);
  }

  return { valid: true, content: cleaned, reason: VALIDATED, warnings };
}

export interface FileWriteOptions {
  /** Target file extension including the dot */
  extension?: string;
}

/**
 * Clean a raw response for writing to a file and validate the result.
 * Never throws; callers must abort the write when `valid` is false.
 */
export function sanitizeForFileWrite(raw: string, options: FileWriteOptions = {}): SanitizationResult {
  return validateCleanedContent(raw, cleanForFileWrite(raw), options.extension);
}
