// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Command Gate
 *
 * The only path from a model response to command execution. Candidates are listed,
 * the user picks execute-all / choose-individually / skip-all, and approved commands
 * run one at a time, each fully awaited before the next.
 */

import chalk from 'chalk';
import type { CommandRunner } from './command-runner.js';
import { logger } from './logger.js';
import type { CommandCandidate, CommandResult } from './types.js';

/**
 * Source of interactive answers.
 */
export interface LineReader {
  question(prompt: string): Promise<string>;
}

export type GateChoice = 'all' | 'selective' | 'skip';

export interface GateOutcome {
  candidate: CommandCandidate;
  decision: 'executed' | 'skipped';
  result?: CommandResult;
}

export interface GateReport {
  choice: GateChoice;
  outcomes: GateOutcome[];
}

/**
 * Map the batch answer to a choice. Anything but the two keywords skips everything.
 */
export function parseGateChoice(answer: string): GateChoice {
  const normalized = answer.trim().toLowerCase();
  if (normalized === 'yes') return 'all';
  if (normalized === 'selective') return 'selective';
  return 'skip';
}

function isApproval(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

/**
 * Format the numbered candidate list with risk annotations.
 */
export function formatCandidates(candidates: readonly CommandCandidate[]): string {
  let display = chalk.yellow.bold('\nSuggested commands:\n');
  candidates.forEach((candidate, index) => {
    display += `  ${chalk.cyan(`${index + 1}.`)} ${chalk.bold(candidate.text)}\n`;
    if (candidate.requiresElevation) {
      display += chalk.yellow('     ⚠️  requires administrator privileges\n');
    }
    for (const warning of candidate.warnings) {
      const color = candidate.destructive ? chalk.red : chalk.yellow;
      display += color(`     ⚠️  ${warning}\n`);
    }
  });
  return display;
}

export class CommandGate {
  constructor(
    private readonly input: LineReader,
    private readonly runner: CommandRunner
  ) {}

  /**
   * Present candidates and execute whatever the user approves.
   */
  async run(candidates: readonly CommandCandidate[], signal?: AbortSignal): Promise<GateReport> {
    if (candidates.length === 0) {
      return { choice: 'skip', outcomes: [] };
    }

    console.log(formatCandidates(candidates));

    const choice = parseGateChoice(
      await this.ask(
        chalk.green("Enter 'yes' to execute all, 'selective' to choose, or anything else to skip: "),
        signal
      )
    );
    logger.debug(`Command gate choice: ${choice}`);

    const outcomes: GateOutcome[] = [];

    if (choice === 'skip') {
      console.log(chalk.magenta('Commands skipped.'));
      return { choice, outcomes: candidates.map(candidate => ({ candidate, decision: 'skipped' })) };
    }

    for (let i = 0; i < candidates.length; i++) {
      const candidate = candidates[i];

      if (signal?.aborted) {
        outcomes.push({ candidate, decision: 'skipped' });
        continue;
      }

      if (choice === 'selective') {
        const answer = await this.ask(
          chalk.yellow(`Execute command ${i + 1}: '${candidate.text}' ? (y/n): `),
          signal
        );
        if (signal?.aborted || !isApproval(answer)) {
          console.log(chalk.magenta(`Skipped: ${candidate.text}`));
          outcomes.push({ candidate, decision: 'skipped' });
          continue;
        }
      }

      const result = await this.execute(candidate, signal);
      outcomes.push({ candidate, decision: 'executed', result });
    }

    return { choice, outcomes };
  }

  private async ask(prompt: string, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      return '';
    }
    try {
      return await this.input.question(prompt);
    } catch (error) {
      // Input closed or interrupted: treat as "no"
      logger.debug(`Prompt ended without an answer: ${error instanceof Error ? error.message : String(error)}`);
      return '';
    }
  }

  private async execute(candidate: CommandCandidate, signal?: AbortSignal): Promise<CommandResult> {
    console.log(chalk.cyan(`\n⚡ Executing: `) + chalk.bold(candidate.text));
    if (candidate.requiresElevation) {
      console.log(chalk.yellow('⚠️  This command requires administrator privileges!'));
    }

    const result = await this.runner.run(candidate.text, signal);
    logger.commandOutcome(candidate.text, result);
    reportResult(result);
    return result;
  }
}

/**
 * Print a command result. Each failure mode is reported distinctly.
 */
export function reportResult(result: CommandResult): void {
  switch (result.status) {
    case 'success':
      console.log(chalk.green('✅ Success!'));
      if (result.stdout.trim()) {
        console.log(chalk.blue('Output:'));
        console.log(result.stdout.trim());
      }
      break;
    case 'failed':
      console.log(chalk.red(`❌ Failed (exit code: ${result.exitCode})`));
      if (result.stderr.trim()) {
        console.log(chalk.red('Error:'));
        console.log(result.stderr.trim());
      }
      break;
    case 'timeout':
      console.log(chalk.red(`⏰ ${result.error ?? 'Command timed out'}`));
      break;
    case 'spawn-error':
      console.log(chalk.red(`💥 ${result.error ?? 'Error executing command'}`));
      break;
    case 'aborted':
      console.log(chalk.magenta('Command aborted.'));
      break;
  }
}
