// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Error types for boundary operations.
 *
 * Parsing and sanitization never throw. Completion calls, file I/O and command
 * spawning can, and each failure is caught where it happens and turned into a
 * non-fatal diagnostic with describeError().
 */

export type ErrorKind =
  | 'completion_unavailable'
  | 'model_unavailable'
  | 'file_unreadable'
  | 'sanitization_rejected'
  | 'command_timeout'
  | 'command_spawn_failure'
  | 'invalid_conversation';

/**
 * Base error with a kind and recovery suggestions.
 */
export class TermsageError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly suggestions: string[] = []
  ) {
    super(message);
    this.name = 'TermsageError';
  }
}

/**
 * The model runtime could not be reached.
 */
export class CompletionUnavailableError extends TermsageError {
  constructor(public readonly baseUrl: string, detail?: string) {
    super(
      `Cannot reach the model runtime at ${baseUrl}${detail ? `: ${detail}` : ''}`,
      'completion_unavailable',
      ['Start the runtime with `ollama serve`', 'Check --base-url or OLLAMA_HOST']
    );
    this.name = 'CompletionUnavailableError';
  }
}

/**
 * The named model is not installed in the runtime.
 */
export class ModelUnavailableError extends TermsageError {
  constructor(public readonly model: string) {
    super(`Model "${model}" is not available`, 'model_unavailable', [
      `Download it with \`ollama pull ${model}\``,
      'Run with --list-models to see installed models',
    ]);
    this.name = 'ModelUnavailableError';
  }
}

export type FileUnreadableReason = 'missing' | 'permission' | 'encoding' | 'not-a-file' | 'unknown';

const FILE_REASON_TEXT: Record<FileUnreadableReason, string> = {
  missing: 'file not found',
  permission: 'permission denied',
  encoding: 'not valid UTF-8 text',
  'not-a-file': 'not a regular file',
  unknown: 'read failed',
};

/**
 * A file could not be read as text.
 */
export class FileUnreadableError extends TermsageError {
  constructor(
    public readonly filePath: string,
    public readonly reason: FileUnreadableReason,
    suggestions: string[] = []
  ) {
    super(`Cannot read ${filePath}: ${FILE_REASON_TEXT[reason]}`, 'file_unreadable', suggestions);
    this.name = 'FileUnreadableError';
  }
}

/**
 * Cleaned content failed validation; the write was aborted.
 */
export class SanitizationRejectedError extends TermsageError {
  constructor(
    public readonly reason: string,
    public readonly rawResponse: string
  ) {
    super(`Edit rejected: ${reason}`, 'sanitization_rejected', [
      'Review the raw response below and apply changes manually',
      'Retry with a more specific instruction',
    ]);
    this.name = 'SanitizationRejectedError';
  }
}

export class CommandTimeoutError extends TermsageError {
  constructor(
    public readonly command: string,
    public readonly timeoutSeconds: number
  ) {
    super(`Command timed out after ${timeoutSeconds}s: ${command}`, 'command_timeout', [
      'Increase the limit with --timeout or COMMAND_TIMEOUT',
    ]);
    this.name = 'CommandTimeoutError';
  }
}

export class CommandSpawnError extends TermsageError {
  constructor(
    public readonly command: string,
    detail: string
  ) {
    super(`Failed to start command "${command}": ${detail}`, 'command_spawn_failure');
    this.name = 'CommandSpawnError';
  }
}

/**
 * A saved conversation file does not hold a list of user/assistant messages.
 */
export class InvalidConversationError extends TermsageError {
  constructor(
    public readonly filePath: string,
    detail: string
  ) {
    super(`Not a saved conversation: ${filePath} (${detail})`, 'invalid_conversation', [
      'Conversation files are JSON arrays of { "role", "content" } objects',
    ]);
    this.name = 'InvalidConversationError';
  }
}

/**
 * Render any thrown value as a user-facing diagnostic.
 */
export function describeError(error: unknown): string {
  if (error instanceof TermsageError) {
    let output = error.message;
    if (error.suggestions.length > 0) {
      output += '\n' + error.suggestions.map(s => `  • ${s}`).join('\n');
    }
    return output;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Whether an error came from an aborted operation.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
