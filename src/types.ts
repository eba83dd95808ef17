// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

// Core message types
/**
 * A single conversation turn sent to or received from the model runtime.
 */
export interface Message {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

/**
 * Roles that may appear in a persisted conversation.
 */
export type ConversationRole = 'user' | 'assistant';

export interface ConversationEntry {
  role: ConversationRole;
  content: string;
}

// Parsed response segments
/**
 * Kinds of content a raw model response is split into.
 */
export type SegmentKind = 'thought' | 'code' | 'command' | 'text';

/**
 * A classified chunk of model output.
 * Created in bulk by a single parse pass and never mutated afterwards.
 */
export interface ResponseSegment {
  readonly kind: SegmentKind;
  /** Payload after marker extraction, before display cleaning */
  readonly content: string;
  /** e.g. `{ language: 'python' }` for code segments; empty otherwise */
  readonly metadata: Readonly<Record<string, string>>;
}

/**
 * Create an immutable segment.
 */
export function segment(
  kind: SegmentKind,
  content: string,
  metadata: Record<string, string> = {}
): ResponseSegment {
  return Object.freeze({ kind, content, metadata: Object.freeze({ ...metadata }) });
}

// Sanitization
/**
 * Outcome of cleaning a raw response for a file write.
 * `valid === false` must block the write.
 */
export interface SanitizationResult {
  valid: boolean;
  content: string;
  /** Human-facing diagnosis */
  reason: string;
  /** Advisory messages that never block a write */
  warnings: string[];
}

// Commands
/**
 * A shell command extracted from a response, with its risk classification.
 */
export interface CommandCandidate {
  text: string;
  requiresElevation: boolean;
  warnings: string[];
  destructive: boolean;
}

/**
 * How a spawned command ended.
 */
export type CommandStatus = 'success' | 'failed' | 'timeout' | 'spawn-error' | 'aborted';

export interface CommandResult {
  status: CommandStatus;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  /** Spawn-level error message, if any */
  error?: string;
}
