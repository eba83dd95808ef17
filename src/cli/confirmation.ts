// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Terminal line input.
 *
 * Wraps a readline interface as the LineReader the command gate and the chat
 * loop ask their questions through.
 */

import { createInterface, type Interface } from 'readline';
import type { LineReader } from '../command-gate.js';

/**
 * Raised when input ends (Ctrl+D, closed pipe) while a question is pending.
 */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

export class TerminalInput implements LineReader {
  readonly rl: Interface;
  private closed = false;
  private pendingReject: ((error: Error) => void) | null = null;

  constructor(rl?: Interface) {
    this.rl = rl ?? createInterface({ input: process.stdin, output: process.stdout, terminal: process.stdin.isTTY ?? false });
    this.rl.on('close', () => {
      this.closed = true;
      if (this.pendingReject) {
        this.pendingReject(new InputClosedError());
        this.pendingReject = null;
      }
    });
  }

  question(prompt: string): Promise<string> {
    if (this.closed) {
      return Promise.reject(new InputClosedError());
    }
    return new Promise((resolve, reject) => {
      this.pendingReject = reject;
      this.rl.question(prompt, answer => {
        this.pendingReject = null;
        resolve(answer);
      });
    });
  }

  /**
   * Register a Ctrl+C handler. Without one readline closes the interface.
   */
  onInterrupt(handler: () => void): void {
    this.rl.on('SIGINT', handler);
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
