// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Interrupt handling for Ctrl+C.
 *
 * While an operation is in flight, an interrupt aborts it through its AbortSignal and
 * the session carries on. With nothing in flight the caller decides (usually: exit).
 */

import { logger } from './logger.js';

export class InterruptHandler {
  private controller: AbortController | null = null;

  /**
   * Mark the start of an interruptible operation and return its signal.
   */
  begin(): AbortSignal {
    this.controller = new AbortController();
    return this.controller.signal;
  }

  /**
   * Mark the current operation as finished.
   */
  end(): void {
    this.controller = null;
  }

  /**
   * Abort the in-flight operation. Returns false when there was nothing to abort.
   */
  interrupt(): boolean {
    if (!this.controller || this.controller.signal.aborted) {
      return false;
    }
    logger.debug('Interrupt received, aborting current operation');
    this.controller.abort();
    return true;
  }

  /**
   * Run an operation with a fresh signal, clearing it afterwards.
   */
  async run<T>(operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const signal = this.begin();
    try {
      return await operation(signal);
    } finally {
      this.end();
    }
  }
}
