// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Model family detection and per-family thought marker tables.
 */

/**
 * Closed set of model families with distinct reasoning markers.
 */
export type ModelFamily = 'llama' | 'codellama' | 'mistral' | 'deepseek' | 'default';

export const MODEL_FAMILIES: readonly ModelFamily[] = ['llama', 'codellama', 'mistral', 'deepseek', 'default'];

/**
 * Ordered thought patterns per family.
 * Sources are compiled with the `gis` flags at parse time.
 */
export const THOUGHT_PATTERNS: Record<ModelFamily, readonly string[]> = {
  llama: [
    '<thinking>(.*?)</thinking>',
    '\\*thinking\\*(.*?)\\*/thinking\\*',
    'Let me think.*?(?=\\n\\n)',
  ],
  codellama: [
    '<reasoning>(.*?)</reasoning>',
    '```reasoning(.*?)```',
  ],
  mistral: [
    '<thoughts>(.*?)</thoughts>',
    '<!--.*?-->',
  ],
  deepseek: [
    '<analyze>(.*?)</analyze>',
    'Analysis:(.*?)(?=Solution:|Answer:|$)',
  ],
  default: [
    '<.*?thinking.*?>(.*?)</.*?>',
    '<.*?thoughts.*?>(.*?)</.*?>',
    '<.*?reasoning.*?>(.*?)</.*?>',
    '\\[thinking\\](.*?)\\[/thinking\\]',
  ],
};

/**
 * Resolve a model identifier to its family.
 * Order matters: "codellama" contains "llama", so the code check guards the llama branch.
 */
export function detectModelFamily(modelName?: string | null): ModelFamily {
  if (!modelName) {
    return 'default';
  }

  const name = modelName.toLowerCase();

  if (name.includes('llama') && !name.includes('code')) {
    return 'llama';
  }
  if (name.includes('codellama') || name.includes('code')) {
    return 'codellama';
  }
  if (name.includes('mistral')) {
    return 'mistral';
  }
  if (name.includes('deepseek')) {
    return 'deepseek';
  }
  return 'default';
}

/**
 * Compile the thought patterns for a family.
 * A fresh RegExp per call keeps `lastIndex` state out of shared tables.
 */
export function compileThoughtPatterns(family: ModelFamily): RegExp[] {
  return THOUGHT_PATTERNS[family].map(source => new RegExp(source, 'gis'));
}
