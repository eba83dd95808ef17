// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware diagnostic output: NORMAL → VERBOSE → DEBUG → TRACE
 */

import chalk from 'chalk';
import type { CommandResult, Message, SanitizationResult } from './types.js';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - only essential information */
  NORMAL = 0,
  /** Verbose - command outcomes and timings */
  VERBOSE = 1,
  /** Debug - request summaries, cleaning decisions */
  DEBUG = 2,
  /** Trace - request/response payloads */
  TRACE = 3,
}

/**
 * Parse log level from CLI options.
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

class Logger {
  private level: LogLevel = LogLevel.NORMAL;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  verbose(message: string): void {
    if (this.level >= LogLevel.VERBOSE) {
      console.log(chalk.dim(message));
    }
  }

  debug(message: string): void {
    if (this.level >= LogLevel.DEBUG) {
      console.log(chalk.dim(`[Debug] ${message}`));
    }
  }

  /**
   * Make a string safe for a single terminal line.
   */
  private sanitize(str: string): string {
    return str
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
      .replace(/\r?\n/g, '\\n')
      .replace(/\t/g, '\\t');
  }

  /**
   * Log a completion request at DEBUG level, payload at TRACE.
   */
  apiRequest(model: string, messages: Message[], streaming: boolean): void {
    if (this.level >= LogLevel.DEBUG) {
      const mode = streaming ? ', streaming' : '';
      console.log(chalk.dim(`[API] Sending to ${model} (${messages.length} messages${mode})...`));
    }
    if (this.level >= LogLevel.TRACE) {
      for (const msg of messages.slice(-5)) {
        const content = msg.content.slice(0, 100);
        console.log(chalk.gray(`    { role: "${msg.role}", content: "${this.sanitize(content)}${msg.content.length > 100 ? '...' : ''}" }`));
      }
      if (messages.length > 5) {
        console.log(chalk.gray(`    ... and ${messages.length - 5} earlier messages`));
      }
    }
  }

  /**
   * Log a completion response at DEBUG level, content at TRACE.
   */
  apiResponse(content: string, duration: number): void {
    if (this.level >= LogLevel.DEBUG) {
      console.log(chalk.dim(`[API] Response: ${content.length} chars, ${duration.toFixed(2)}s`));
    }
    if (this.level >= LogLevel.TRACE) {
      const truncated = content.length > 300 ? content.slice(0, 300) + '...' : content;
      console.log(chalk.gray(`  content: "${this.sanitize(truncated)}"`));
    }
  }

  /**
   * Log a command outcome at VERBOSE level.
   */
  commandOutcome(command: string, result: CommandResult): void {
    if (this.level >= LogLevel.VERBOSE) {
      const durationStr = (result.durationMs / 1000).toFixed(2);
      if (result.status === 'success') {
        console.log(chalk.green(`✓ ${command}`) + chalk.dim(` (${durationStr}s)`));
      } else {
        console.log(chalk.red(`✗ ${command}`) + chalk.dim(` (${result.status}, ${durationStr}s)`));
      }
    }
  }

  /**
   * Log a file-write cleaning decision at DEBUG level.
   */
  sanitization(originalLength: number, result: SanitizationResult): void {
    if (this.level >= LogLevel.DEBUG) {
      const verdict = result.valid ? 'accepted' : 'rejected';
      console.log(chalk.dim(
        `[Sanitize] ${verdict}: ${originalLength} → ${result.content.length} chars (${result.reason})`
      ));
      for (const warning of result.warnings) {
        console.log(chalk.dim(`[Sanitize] warning: ${warning}`));
      }
    }
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`Warning: ${message}`));
  }
}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
