// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Spinner Manager
 *
 * Activity indicator shown while waiting on the model.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { THINKING_MESSAGES } from './constants.js';

/**
 * Manages a single spinner instance with TTY detection.
 */
class SpinnerManager {
  private spinner: Ora | null = null;
  private enabled: boolean = true;
  private streaming: boolean = false;

  constructor() {
    // Piped output gets no spinner
    this.enabled = process.stdout.isTTY ?? false;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled && this.spinner) {
      this.stop();
    }
  }

  isEnabled(): boolean {
    return this.enabled && !this.streaming;
  }

  /**
   * Mark that streamed tokens are being printed (hides the spinner).
   */
  setStreaming(streaming: boolean): void {
    this.streaming = streaming;
    if (streaming && this.spinner) {
      this.stop();
    }
  }

  start(text: string): void {
    if (!this.isEnabled()) return;

    try {
      if (this.spinner) {
        this.spinner.stop();
      }

      this.spinner = ora({
        text,
        color: 'cyan',
        spinner: 'dots',
        discardStdin: false, // readline owns stdin
      }).start();
    } catch {
      // A broken spinner must not break the session
      this.spinner = null;
    }
  }

  stop(): void {
    try {
      if (this.spinner) {
        this.spinner.stop();
        this.spinner = null;
      }
    } catch {
      this.spinner = null;
    }
  }

  /**
   * Show a randomly chosen "thinking" message.
   */
  thinking(): void {
    const message = THINKING_MESSAGES[Math.floor(Math.random() * THINKING_MESSAGES.length)];
    this.start(chalk.cyan(message));
  }
}

/**
 * Singleton spinner instance for global use.
 */
export const spinner = new SpinnerManager();
