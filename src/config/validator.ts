// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Validator
 */

import type { AssistantConfig, ConfigLayer } from './types.js';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Pick the known, well-typed fields out of parsed JSON.
 * Fields with the wrong type are dropped with a warning.
 */
export function coerceConfigLayer(data: unknown, source: string): { layer: ConfigLayer; warnings: string[] } {
  const warnings: string[] = [];
  const layer: ConfigLayer = {};

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return { layer, warnings: [`${source}: expected a JSON object`] };
  }

  const entries = new Map<string, unknown>(Object.entries(data));
  const wrongType = (key: string, expected: string): void => {
    warnings.push(`${source}: "${key}" should be ${expected}`);
  };

  for (const [key, value] of entries) {
    switch (key) {
      case 'model':
      case 'baseUrl':
        if (typeof value === 'string') layer[key] = value;
        else wrongType(key, 'a string');
        break;
      case 'timeoutSeconds':
        if (typeof value === 'number' && value > 0) layer[key] = value;
        else wrongType(key, 'a positive number');
        break;
      case 'previewSizeThreshold':
        if (typeof value === 'number') layer[key] = value;
        else wrongType(key, 'a number');
        break;
      case 'createBackups':
      case 'showThoughts':
      case 'stream':
        if (typeof value === 'boolean') layer[key] = value;
        else wrongType(key, 'true or false');
        break;
      case 'elevationPrefixes':
      case 'exitKeywords':
        if (isStringArray(value)) layer[key] = value;
        else wrongType(key, 'an array of strings');
        break;
      default:
        warnings.push(`${source}: unknown option "${key}"`);
    }
  }

  return { layer, warnings };
}

/**
 * Validate resolved configuration.
 * Returns an array of warning messages for invalid options.
 */
export function validateConfig(config: AssistantConfig): string[] {
  const warnings: string[] = [];

  if (!/^https?:\/\//.test(config.baseUrl)) {
    warnings.push(`baseUrl should start with http:// or https://: "${config.baseUrl}"`);
  }

  if (!Number.isFinite(config.timeoutSeconds) || config.timeoutSeconds <= 0) {
    warnings.push('timeoutSeconds must be a positive number');
  }

  if (!Number.isFinite(config.previewSizeThreshold) || config.previewSizeThreshold < 0) {
    warnings.push('previewSizeThreshold must be zero or a positive number');
  }

  if (config.exitKeywords.length === 0) {
    warnings.push('exitKeywords is empty; chat can only be left with Ctrl+C');
  }

  if (config.elevationPrefixes.some(prefix => prefix.trim() === '')) {
    warnings.push('elevationPrefixes contains an empty prefix, which is ignored');
  }

  return warnings;
}
