// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Natural-language system administration help with gated command execution.
 */

import chalk from 'chalk';
import { CommandGate, type GateReport } from '../command-gate.js';
import { describeError, isAbortError } from '../errors.js';
import { logger } from '../logger.js';
import { ResponseParser } from '../parsing/response-parser.js';
import { spinner } from '../spinner.js';
import { extractCandidates } from '../utils/command-safety.js';
import type { AssistantContext } from './context.js';
import { buildSystemPrompt } from './prompts.js';
import { renderResponse } from './render.js';

export interface SystemAnswer {
  response: string;
  report: GateReport;
}

/**
 * Offer any EXECUTE_COMMAND lines in a reply to the user through the gate.
 */
export async function offerCommands(ctx: AssistantContext, response: string): Promise<GateReport> {
  const candidates = extractCandidates(response, ctx.config.elevationPrefixes);
  if (candidates.length === 0) {
    return { choice: 'skip', outcomes: [] };
  }
  const gate = new CommandGate(ctx.input, ctx.runner);
  return ctx.interrupts.run(signal => gate.run(candidates, signal));
}

export async function askSystem(ctx: AssistantContext, question: string): Promise<SystemAnswer | null> {
  console.log(chalk.green.bold('🖥️  System Assistant'));

  let response: string;
  spinner.thinking();
  try {
    response = await ctx.interrupts.run(signal =>
      ctx.client.complete(ctx.model, [{ role: 'user', content: buildSystemPrompt(question) }], signal)
    );
  } catch (error) {
    spinner.stop();
    if (isAbortError(error)) {
      console.log(chalk.magenta('Request cancelled.'));
    } else {
      logger.error(describeError(error));
    }
    return null;
  }
  spinner.stop();

  console.log(renderResponse(response, new ResponseParser(ctx.model), {
    title: '🖥️  System Assistant Response',
    color: 'green',
    showThoughts: ctx.config.showThoughts,
  }));

  const report = await offerCommands(ctx, response);
  return { response, report };
}
