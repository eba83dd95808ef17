// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Single-shot file analysis.
 */

import chalk from 'chalk';
import * as path from 'path';
import { describeError, isAbortError } from '../errors.js';
import { logger } from '../logger.js';
import { ResponseParser } from '../parsing/response-parser.js';
import { spinner } from '../spinner.js';
import { readTextFile, type TextFile } from '../utils/file-io.js';
import type { AssistantContext } from './context.js';
import { buildAnalysisPrompt } from './prompts.js';
import { renderFileInfo, renderPreview, renderResponse } from './render.js';

/**
 * Read a file, ask the model about it and print the answer.
 * Returns the raw reply, or null when the file or the model was unavailable.
 */
export async function analyzeFile(ctx: AssistantContext, filePath: string, prompt?: string): Promise<string | null> {
  let file: TextFile;
  try {
    file = await readTextFile(filePath);
  } catch (error) {
    logger.error(describeError(error));
    return null;
  }

  console.log(renderFileInfo(file.path, file.content));
  const preview = renderPreview(file.path, file.content, ctx.config.previewSizeThreshold);
  if (preview) {
    console.log(preview);
  }

  console.log(chalk.blue.bold(`🔍 Analyzing ${file.path}...`));
  const message = buildAnalysisPrompt(file.path, file.content, prompt);

  let reply: string;
  spinner.thinking();
  try {
    reply = await ctx.interrupts.run(signal =>
      ctx.client.complete(ctx.model, [{ role: 'user', content: message }], signal)
    );
  } catch (error) {
    spinner.stop();
    if (isAbortError(error)) {
      console.log(chalk.magenta('Analysis cancelled.'));
    } else {
      logger.error(describeError(error));
    }
    return null;
  }
  spinner.stop();

  const parser = new ResponseParser(ctx.model);
  console.log(renderResponse(reply, parser, {
    title: `📄 Analysis of ${path.basename(file.path)}`,
    color: 'blue',
    showThoughts: ctx.config.showThoughts,
  }));
  return reply;
}
