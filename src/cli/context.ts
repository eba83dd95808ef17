// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { CommandRunner } from '../command-runner.js';
import type { LineReader } from '../command-gate.js';
import type { AssistantConfig } from '../config/index.js';
import type { InterruptHandler } from '../interrupt.js';
import type { CompletionClient } from '../providers/base.js';

/**
 * Everything an operation needs, built once at startup.
 */
export interface AssistantContext {
  config: AssistantConfig;
  client: CompletionClient;
  model: string;
  input: LineReader;
  runner: CommandRunner;
  interrupts: InterruptHandler;
}
