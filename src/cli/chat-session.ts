// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Interactive chat.
 *
 * Each turn appends the user message, gets the reply (streamed or whole), shows it,
 * appends the raw reply and offers any suggested commands through the gate.
 */

import chalk from 'chalk';
import { describeError, isAbortError } from '../errors.js';
import { logger } from '../logger.js';
import { ResponseParser } from '../parsing/response-parser.js';
import { StreamingResponseParser, type ClassifiedToken } from '../parsing/streaming-parser.js';
import { ConversationHistory, loadConversation, saveConversation } from '../session.js';
import { spinner } from '../spinner.js';
import { InputClosedError } from './confirmation.js';
import type { AssistantContext } from './context.js';
import { renderPanel, renderResponse } from './render.js';
import { offerCommands } from './system-assistant.js';

export type ChatAction = 'continue' | 'exit';

const HISTORY_PREVIEW_LENGTH = 200;

const CHAT_HELP = [
  '/save [file]   save the conversation (default chat_YYYYMMDD_HHMMSS.json)',
  '/load <file>   replace the conversation with a saved one',
  '/clear         forget the conversation so far',
  '/history       show the conversation so far',
  '/help          show this list',
].join('\n');

/**
 * Output sink for streamed tokens.
 */
export interface TokenWriter {
  write(text: string): void;
}

export class ChatSession {
  readonly history: ConversationHistory;
  private readonly out: TokenWriter;

  constructor(
    private readonly ctx: AssistantContext,
    options: { history?: ConversationHistory; out?: TokenWriter } = {}
  ) {
    this.history = options.history ?? new ConversationHistory();
    this.out = options.out ?? process.stdout;
  }

  /**
   * Run the read-reply loop until an exit keyword or end of input.
   */
  async start(): Promise<void> {
    const exits = this.ctx.config.exitKeywords.map(k => `'${k}'`).join(', ');
    console.log(renderPanel('Welcome', [
      chalk.blue.bold('🤖 termsage chat'),
      `Model: ${this.ctx.model}`,
      `Type your questions. Use ${exits || 'Ctrl+C'} to end the chat, /help for commands.`,
    ].join('\n'), 'blue'));

    for (;;) {
      let line: string;
      try {
        line = await this.ctx.input.question(chalk.cyan.bold('\nYou: '));
      } catch (error) {
        if (error instanceof InputClosedError) break;
        throw error;
      }
      if ((await this.handleInput(line)) === 'exit') break;
    }

    console.log(chalk.magenta.bold('Goodbye!'));
  }

  /**
   * Handle one line of user input.
   */
  async handleInput(line: string): Promise<ChatAction> {
    const text = line.trim();
    if (!text) {
      return 'continue';
    }
    if (this.ctx.config.exitKeywords.includes(text.toLowerCase())) {
      return 'exit';
    }
    if (text.startsWith('/')) {
      this.runChatCommand(text);
      return 'continue';
    }
    await this.turn(text);
    return 'continue';
  }

  /**
   * One conversational turn. Returns the raw reply, or null when there was none.
   */
  async turn(text: string): Promise<string | null> {
    this.history.append('user', text);

    let reply: string;
    try {
      reply = await this.ctx.interrupts.run(signal =>
        this.ctx.config.stream ? this.streamReply(signal) : this.completeReply(signal)
      );
    } catch (error) {
      spinner.stop();
      if (isAbortError(error)) {
        console.log(chalk.magenta('\nResponse interrupted.'));
      } else {
        logger.error(describeError(error));
      }
      return null;
    }

    this.history.append('assistant', reply);
    await offerCommands(this.ctx, reply);
    return reply;
  }

  private async completeReply(signal: AbortSignal): Promise<string> {
    spinner.thinking();
    let reply: string;
    try {
      reply = await this.ctx.client.complete(this.ctx.model, this.history.toMessages(), signal);
    } finally {
      spinner.stop();
    }
    console.log(renderResponse(reply, new ResponseParser(this.ctx.model), {
      title: '🤖 Assistant',
      color: 'green',
      showThoughts: this.ctx.config.showThoughts,
    }));
    return reply;
  }

  private async streamReply(signal: AbortSignal): Promise<string> {
    const parser = new StreamingResponseParser();
    let started = false;

    spinner.thinking();
    try {
      for await (const token of this.ctx.client.completeStreaming(this.ctx.model, this.history.toMessages(), signal)) {
        if (!started) {
          spinner.setStreaming(true);
          this.out.write(chalk.green.bold('\n🤖 Assistant: '));
          started = true;
        }
        this.writePieces(parser.push(token));
      }
      this.writePieces(parser.flush());
    } finally {
      spinner.stop();
      spinner.setStreaming(false);
      if (started) this.out.write('\n');
    }

    return parser.getBuffer();
  }

  private writePieces(pieces: ClassifiedToken[]): void {
    for (const piece of pieces) {
      if (piece.kind === 'text') {
        this.out.write(piece.text);
      } else if (this.ctx.config.showThoughts) {
        this.out.write(chalk.dim(piece.text));
      }
    }
  }

  private runChatCommand(text: string): void {
    const [command, ...rest] = text.split(/\s+/);
    const arg = rest.join(' ');

    switch (command.toLowerCase()) {
      case '/save':
        try {
          const saved = saveConversation(this.history, arg || undefined);
          console.log(chalk.green(`💾 Conversation saved to ${saved}`));
        } catch (error) {
          logger.error(`Error saving conversation: ${describeError(error)}`);
        }
        break;
      case '/load':
        if (!arg) {
          console.log(chalk.yellow('Usage: /load <file>'));
          break;
        }
        try {
          this.history.replace(loadConversation(arg));
          console.log(chalk.green(`📂 Conversation loaded from ${arg} (${this.history.length} messages)`));
        } catch (error) {
          logger.error(`Error loading conversation: ${describeError(error)}`);
        }
        break;
      case '/clear':
        this.history.clear();
        console.log(chalk.yellow('Conversation history cleared'));
        break;
      case '/history':
        this.printHistory();
        break;
      case '/help':
        console.log(CHAT_HELP);
        break;
      default:
        console.log(chalk.yellow(`Unknown command ${command}`));
        console.log(CHAT_HELP);
    }
  }

  private printHistory(): void {
    const entries = this.history.entries();
    if (entries.length === 0) {
      console.log(chalk.dim('No messages yet.'));
      return;
    }
    for (const entry of entries) {
      const label = entry.role === 'user' ? chalk.cyan.bold('You') : chalk.green.bold('Assistant');
      const content = entry.content.length > HISTORY_PREVIEW_LENGTH
        ? entry.content.slice(0, HISTORY_PREVIEW_LENGTH) + '...'
        : entry.content;
      console.log(`${label}: ${content}`);
    }
  }
}
