// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Top-level dispatch: build the config once, pick the model, run one operation.
 */

import chalk from 'chalk';
import { CommandRunner } from '../command-runner.js';
import type { LineReader } from '../command-gate.js';
import { resolveConfig, type CLIOptions } from '../config/index.js';
import { describeError } from '../errors.js';
import { InterruptHandler } from '../interrupt.js';
import { logger } from '../logger.js';
import { createCompletionClient, type CompletionClient } from '../providers/index.js';
import { ChatSession } from './chat-session.js';
import type { AssistantContext } from './context.js';
import { analyzeFile } from './file-analysis.js';
import { editFile } from './file-edit.js';
import { printModels, selectModel } from './model-selection.js';
import { askSystem } from './system-assistant.js';

/**
 * Option values produced by the command line parser.
 */
export type ProgramOptions = {
  model?: string;
  read?: string;
  prompt?: string;
  edit?: string;
  instruction?: string;
  system?: string;
  chat?: boolean;
  listModels?: boolean;
  showThoughts?: boolean;
  stream?: boolean;
  backup?: boolean;
  timeout?: number;
  baseUrl?: string;
};

export interface RunDependencies {
  input: LineReader;
  client?: CompletionClient;
  runner?: CommandRunner;
  interrupts?: InterruptHandler;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  globalConfigPath?: string;
}

export function toCliOptions(options: ProgramOptions): CLIOptions {
  return {
    model: options.model,
    baseUrl: options.baseUrl,
    timeout: options.timeout,
    showThoughts: options.showThoughts,
    stream: options.stream,
    backup: options.backup,
  };
}

/**
 * Run the requested operation. Returns the process exit code.
 */
export async function runAssistant(options: ProgramOptions, deps: RunDependencies): Promise<number> {
  const { config } = resolveConfig({
    cwd: deps.cwd,
    env: deps.env,
    globalConfigPath: deps.globalConfigPath,
    cli: toCliOptions(options),
  });
  logger.debug(`Runtime: ${config.baseUrl}, command timeout ${config.timeoutSeconds}s`);

  const client = deps.client ?? createCompletionClient(config);

  if (options.listModels) {
    try {
      await printModels(client);
      return 0;
    } catch (error) {
      logger.error(describeError(error));
      return 1;
    }
  }

  let model: string;
  try {
    model = config.model ?? (await selectModel(client, deps.input));
  } catch (error) {
    logger.error(describeError(error));
    return 1;
  }

  const ctx: AssistantContext = {
    config,
    client,
    model,
    input: deps.input,
    runner: deps.runner ?? new CommandRunner({ timeoutSeconds: config.timeoutSeconds, cwd: deps.cwd }),
    interrupts: deps.interrupts ?? new InterruptHandler(),
  };

  if (options.read) {
    return (await analyzeFile(ctx, options.read, options.prompt)) === null ? 1 : 0;
  }

  if (options.edit) {
    const instruction = options.instruction || (await deps.input.question(chalk.yellow.bold('Enter editing instruction: ')));
    if (!instruction.trim()) {
      logger.warn('No instruction given; nothing to do.');
      return 1;
    }
    const outcome = await editFile(ctx, options.edit, instruction);
    return outcome.status === 'written' || outcome.status === 'unchanged' ? 0 : 1;
  }

  if (options.system) {
    return (await askSystem(ctx, options.system)) === null ? 1 : 0;
  }

  await new ChatSession(ctx).start();
  return 0;
}
