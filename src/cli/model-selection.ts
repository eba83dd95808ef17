// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Model listing and interactive selection.
 */

import chalk from 'chalk';
import type { LineReader } from '../command-gate.js';
import { TermsageError } from '../errors.js';
import type { CompletionClient } from '../providers/base.js';

export class NoModelsError extends TermsageError {
  constructor() {
    super('No models found in the runtime', 'model_unavailable', [
      'Install one first, for example `ollama pull llama3.2`',
    ]);
    this.name = 'NoModelsError';
  }
}

/**
 * Print the installed models. Returns how many there are.
 */
export async function printModels(client: CompletionClient): Promise<number> {
  const models = await client.listModels();
  if (models.length === 0) {
    console.log(chalk.yellow('No models installed.'));
    return 0;
  }
  console.log(chalk.yellow.bold('Available models:'));
  for (const model of models) {
    console.log(`  • ${model}`);
  }
  return models.length;
}

/**
 * Parse a 1-based menu choice. Returns the 0-based index or null.
 */
export function parseModelChoice(answer: string, count: number): number | null {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const choice = Number(trimmed);
  return choice >= 1 && choice <= count ? choice - 1 : null;
}

/**
 * Pick a model: the only one installed, or the user's choice from a numbered list.
 */
export async function selectModel(client: CompletionClient, input: LineReader): Promise<string> {
  const models = await client.listModels();

  if (models.length === 0) {
    throw new NoModelsError();
  }

  if (models.length === 1) {
    console.log(`${chalk.green.bold('Using model:')} ${models[0]}`);
    return models[0];
  }

  console.log(chalk.yellow.bold('Available models:'));
  models.forEach((model, i) => {
    console.log(`${chalk.blue.bold(String(i + 1))}: ${model}`);
  });

  for (;;) {
    const index = parseModelChoice(await input.question('\nChoose a model by number: '), models.length);
    if (index !== null) {
      console.log(`${chalk.green.bold('Using model:')} ${models[index]}`);
      return models[index];
    }
    console.log(chalk.red.bold('Invalid choice, try again.'));
  }
}
