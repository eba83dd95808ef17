// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Priority: CLI options > workspace config > global config > environment > defaults
 */

import { COMMAND_CONFIG, DEFAULT_ELEVATION_PREFIXES, DEFAULT_EXIT_KEYWORDS } from '../constants.js';
import type { AssistantConfig, ConfigLayer } from './types.js';

export const DEFAULT_CONFIG: AssistantConfig = {
  baseUrl: 'http://localhost:11434',
  timeoutSeconds: COMMAND_CONFIG.TIMEOUT_SECONDS,
  previewSizeThreshold: 2000,
  createBackups: true,
  elevationPrefixes: [...DEFAULT_ELEVATION_PREFIXES],
  exitKeywords: [...DEFAULT_EXIT_KEYWORDS],
  showThoughts: false,
  stream: true,
};

/**
 * CLI options that can override configuration.
 */
export interface CLIOptions {
  model?: string;
  baseUrl?: string;
  timeout?: number;
  showThoughts?: boolean;
  /** commander sets this to false for --no-stream */
  stream?: boolean;
  /** commander sets this to false for --no-backup */
  backup?: boolean;
}

/**
 * A zero or negative timeout would leave commands unbounded, so it never replaces a lower layer.
 */
function isPositive(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

/**
 * Apply one layer on top of the resolved config.
 */
function applyLayer(config: AssistantConfig, source: ConfigLayer): void {
  if (source.model) config.model = source.model;
  if (source.baseUrl) config.baseUrl = source.baseUrl;
  if (isPositive(source.timeoutSeconds)) config.timeoutSeconds = source.timeoutSeconds;
  if (source.previewSizeThreshold !== undefined && Number.isFinite(source.previewSizeThreshold)) {
    config.previewSizeThreshold = source.previewSizeThreshold;
  }
  if (source.createBackups !== undefined) config.createBackups = source.createBackups;
  if (source.elevationPrefixes) config.elevationPrefixes = [...source.elevationPrefixes];
  if (source.exitKeywords) config.exitKeywords = source.exitKeywords.map(k => k.toLowerCase());
  if (source.showThoughts !== undefined) config.showThoughts = source.showThoughts;
  if (source.stream !== undefined) config.stream = source.stream;
}

/**
 * Merge layers, lowest priority first, then CLI options.
 */
export function mergeConfig(layers: Array<ConfigLayer | null>, cliOptions: CLIOptions = {}): AssistantConfig {
  const config: AssistantConfig = {
    ...DEFAULT_CONFIG,
    elevationPrefixes: [...DEFAULT_CONFIG.elevationPrefixes],
    exitKeywords: [...DEFAULT_CONFIG.exitKeywords],
  };

  for (const layer of layers) {
    if (layer) applyLayer(config, layer);
  }

  if (cliOptions.model) config.model = cliOptions.model;
  if (cliOptions.baseUrl) config.baseUrl = cliOptions.baseUrl;
  if (isPositive(cliOptions.timeout)) config.timeoutSeconds = cliOptions.timeout;
  if (cliOptions.showThoughts) config.showThoughts = true;
  if (cliOptions.stream === false) config.stream = false;
  if (cliOptions.backup === false) config.createBackups = false;

  config.baseUrl = config.baseUrl.replace(/\/+$/, '');
  return config;
}
