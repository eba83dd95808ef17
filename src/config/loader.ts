// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Reads configuration layers from the environment and from JSON files.
 */

import * as fs from 'fs';
import { logger } from '../logger.js';
import { TermsagePaths } from '../paths.js';
import type { ConfigLayer } from './types.js';
import { coerceConfigLayer } from './validator.js';

/**
 * Workspace config file name, looked up in the working directory.
 */
export const WORKSPACE_CONFIG_FILE = '.termsage.json';

export interface LoadedLayer {
  config: ConfigLayer | null;
  configPath: string | null;
}

/**
 * Read one JSON config file. A missing file yields no layer; an unreadable one
 * logs a warning and is ignored.
 */
export function loadConfigFile(configPath: string): LoadedLayer {
  if (!fs.existsSync(configPath)) {
    return { config: null, configPath: null };
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    logger.warn(`Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
    return { config: null, configPath };
  }

  const { layer, warnings } = coerceConfigLayer(data, configPath);
  for (const warning of warnings) {
    logger.warn(warning);
  }
  return { config: layer, configPath };
}

/**
 * Load ~/.termsage/config.json (or the given path).
 */
export function loadGlobalConfig(overridePath?: string): LoadedLayer {
  return loadConfigFile(overridePath ?? TermsagePaths.globalConfig());
}

/**
 * Load .termsage.json from the working directory.
 */
export function loadWorkspaceConfig(cwd: string = process.cwd()): LoadedLayer {
  return loadConfigFile(TermsagePaths.workspaceConfig(cwd));
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function parseNumber(name: string, value: string): number | undefined {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    logger.warn(`Ignoring ${name}="${value}": not a number`);
    return undefined;
  }
  return parsed;
}

/**
 * Build a layer from environment variables.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const layer: ConfigLayer = {};

  if (env.DEFAULT_MODEL) layer.model = env.DEFAULT_MODEL;
  if (env.OLLAMA_HOST) layer.baseUrl = env.OLLAMA_HOST;

  if (env.COMMAND_TIMEOUT !== undefined) {
    const timeout = parseNumber('COMMAND_TIMEOUT', env.COMMAND_TIMEOUT);
    if (timeout !== undefined && timeout <= 0) {
      logger.warn(`Ignoring COMMAND_TIMEOUT="${env.COMMAND_TIMEOUT}": must be a positive number of seconds`);
    } else if (timeout !== undefined) {
      layer.timeoutSeconds = timeout;
    }
  }
  if (env.MAX_PREVIEW_SIZE !== undefined) {
    const preview = parseNumber('MAX_PREVIEW_SIZE', env.MAX_PREVIEW_SIZE);
    if (preview !== undefined) layer.previewSizeThreshold = preview;
  }

  if (env.CREATE_BACKUPS !== undefined) {
    layer.createBackups = env.CREATE_BACKUPS.trim().toLowerCase() === 'true';
  }
  if (env.SUDO_PREFIXES !== undefined) {
    layer.elevationPrefixes = splitList(env.SUDO_PREFIXES);
  }
  if (env.EXIT_COMMANDS !== undefined) {
    layer.exitKeywords = splitList(env.EXIT_COMMANDS);
  }

  return layer;
}
