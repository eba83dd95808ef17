// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import type { Message } from '../types.js';

/**
 * Access to a local model runtime.
 * Implement this interface to add support for another backend.
 */
export interface CompletionClient {
  /**
   * Send the conversation and wait for the full reply.
   */
  complete(modelId: string, messages: Message[], signal?: AbortSignal): Promise<string>;

  /**
   * Send the conversation and yield reply tokens as they arrive.
   */
  completeStreaming(modelId: string, messages: Message[], signal?: AbortSignal): AsyncIterable<string>;

  /**
   * Names of the installed models.
   */
  listModels(): Promise<string[]>;
}
