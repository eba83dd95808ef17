// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import type { AssistantConfig } from '../config/index.js';
import type { CompletionClient } from './base.js';
import { OllamaClient } from './ollama-native.js';

export type { CompletionClient } from './base.js';
export { OllamaClient } from './ollama-native.js';
export { MockCompletionClient } from './mock.js';
export type { MockReply, MockClientConfig, MockCall } from './mock.js';

/**
 * Create the completion client for the configured runtime.
 */
export function createCompletionClient(config: Pick<AssistantConfig, 'baseUrl'>): CompletionClient {
  return new OllamaClient(config.baseUrl);
}
