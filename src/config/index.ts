// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * - types.ts     - ConfigLayer and AssistantConfig
 * - loader.ts    - environment and JSON file layers
 * - validator.ts - layer coercion and config validation
 * - merger.ts    - defaults and layer merging
 */

import { logger } from '../logger.js';
import { loadEnvConfig, loadGlobalConfig, loadWorkspaceConfig } from './loader.js';
import { mergeConfig, type CLIOptions } from './merger.js';
import type { AssistantConfig } from './types.js';
import { validateConfig } from './validator.js';

export type { AssistantConfig, ConfigLayer } from './types.js';
export {
  WORKSPACE_CONFIG_FILE,
  loadConfigFile,
  loadGlobalConfig,
  loadWorkspaceConfig,
  loadEnvConfig,
} from './loader.js';
export { coerceConfigLayer, validateConfig } from './validator.js';
export { DEFAULT_CONFIG, mergeConfig } from './merger.js';
export type { CLIOptions } from './merger.js';

export interface ResolveOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  globalConfigPath?: string;
  cli?: CLIOptions;
}

/**
 * Build the configuration for this run: defaults, environment, global file,
 * workspace file, then CLI options. Validation problems are logged, not fatal.
 */
export function resolveConfig(options: ResolveOptions = {}): { config: AssistantConfig; warnings: string[] } {
  const global = loadGlobalConfig(options.globalConfigPath);
  const workspace = loadWorkspaceConfig(options.cwd);

  if (global.configPath) logger.debug(`Global config: ${global.configPath}`);
  if (workspace.configPath) logger.debug(`Workspace config: ${workspace.configPath}`);

  const config = mergeConfig(
    [loadEnvConfig(options.env), global.config, workspace.config],
    options.cli
  );

  const warnings = validateConfig(config);
  for (const warning of warnings) {
    logger.warn(`Config: ${warning}`);
  }
  return { config, warnings };
}
