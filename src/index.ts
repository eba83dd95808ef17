#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import chalk from 'chalk';
import { InvalidArgumentError, program } from 'commander';
import { InputClosedError, TerminalInput } from './cli/confirmation.js';
import { runAssistant, type ProgramOptions } from './cli/run.js';
import { describeError } from './errors.js';
import { InterruptHandler } from './interrupt.js';
import { LogLevel, logger, parseLogLevel } from './logger.js';
import { spinner } from './spinner.js';
import { VERSION } from './version.js';

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('Expected a positive number of seconds.');
  }
  return seconds;
}

// CLI setup
program
  .name('termsage')
  .description('Terminal assistant for local Ollama models')
  .version(VERSION, '-v, --version', 'Output the current version')
  .option('-m, --model <name>', 'Model to use')
  .option('-r, --read <file>', 'Read and analyze a file')
  .option('-p, --prompt <text>', 'Custom prompt for file analysis')
  .option('-e, --edit <file>', 'Edit a file with AI assistance')
  .option('-i, --instruction <text>', 'Instruction for file editing')
  .option('-s, --system <question>', 'Ask a system administration question')
  .option('-c, --chat', 'Start interactive chat (default)')
  .option('--list-models', 'List installed models and exit')
  .option('--show-thoughts', 'Show model reasoning in responses')
  .option('--no-stream', 'Wait for whole replies instead of streaming tokens')
  .option('--no-backup', 'Do not write <file>.backup before editing')
  .option('--timeout <seconds>', 'Time limit per executed command', parseSeconds)
  .option('--base-url <url>', 'Model runtime URL (default http://localhost:11434)')
  .option('--verbose', 'Show command outcomes and timings')
  .option('--debug', 'Show request and cleaning details')
  .option('--trace', 'Show full request/response payloads')
  .addHelpText('after', `
Examples:
  $ termsage --read app.py
  $ termsage --edit app.py --instruction "add type hints"
  $ termsage --system "how do I free disk space?"`)
  .parse();

const options = program.opts<ProgramOptions & { verbose?: boolean; debug?: boolean; trace?: boolean }>();

async function main(): Promise<number> {
  logger.setLevel(parseLogLevel(options));
  if (logger.getLevel() > LogLevel.NORMAL) {
    // Spinners garble verbose output
    spinner.setEnabled(false);
  }

  const input = new TerminalInput();
  const interrupts = new InterruptHandler();
  input.onInterrupt(() => {
    if (!interrupts.interrupt()) {
      console.log(chalk.magenta.bold('\nGoodbye!'));
      input.close();
    }
  });

  try {
    return await runAssistant(options, { input, interrupts });
  } catch (error) {
    if (error instanceof InputClosedError) {
      return 0;
    }
    throw error;
  } finally {
    input.close();
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(describeError(error), error instanceof Error ? error : undefined);
    process.exitCode = 1;
  });
