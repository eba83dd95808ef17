// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Mock Completion Client for Testing
 *
 * Returns queued replies in order, records every call, and streams replies
 * in fixed-size chunks.
 */

import type { Message } from '../types.js';
import type { CompletionClient } from './base.js';

/**
 * A single mock reply.
 */
export interface MockReply {
  /** Text to return */
  content?: string;
  /** Throw this instead of replying */
  error?: Error;
  /** Explicit stream chunks; overrides chunking of `content` */
  chunks?: string[];
}

export interface MockClientConfig {
  /** Queue of replies to return in order */
  replies?: Array<MockReply | string>;
  /** Reply when the queue is empty */
  defaultReply?: string;
  /** Installed models reported by listModels() */
  models?: string[];
  /** Chunk size for streaming (default: 10 characters) */
  streamChunkSize?: number;
}

/**
 * Record of a single call to the client.
 */
export interface MockCall {
  method: 'complete' | 'completeStreaming';
  modelId: string;
  messages: Message[];
}

export class MockCompletionClient implements CompletionClient {
  private queue: MockReply[];
  private readonly defaultReply: string;
  private readonly models: string[];
  private readonly streamChunkSize: number;
  private calls: MockCall[] = [];

  constructor(config: MockClientConfig = {}) {
    this.queue = (config.replies ?? []).map(reply => (typeof reply === 'string' ? { content: reply } : reply));
    this.defaultReply = config.defaultReply ?? 'This is a mock reply.';
    this.models = config.models ?? ['mock-model'];
    this.streamChunkSize = config.streamChunkSize ?? 10;
  }

  async complete(modelId: string, messages: Message[], signal?: AbortSignal): Promise<string> {
    this.record('complete', modelId, messages);
    signal?.throwIfAborted();
    const reply = this.next();
    if (reply.error) throw reply.error;
    return reply.chunks ? reply.chunks.join('') : reply.content ?? '';
  }

  async *completeStreaming(modelId: string, messages: Message[], signal?: AbortSignal): AsyncGenerator<string> {
    this.record('completeStreaming', modelId, messages);
    const reply = this.next();
    if (reply.error) throw reply.error;

    for (const chunk of reply.chunks ?? this.chunk(reply.content ?? '')) {
      signal?.throwIfAborted();
      yield chunk;
    }
  }

  async listModels(): Promise<string[]> {
    return [...this.models];
  }

  getCallCount(): number {
    return this.calls.length;
  }

  getLastCall(): MockCall | undefined {
    return this.calls[this.calls.length - 1];
  }

  private record(method: MockCall['method'], modelId: string, messages: Message[]): void {
    this.calls.push({ method, modelId, messages: messages.map(m => ({ ...m })) });
  }

  private next(): MockReply {
    return this.queue.shift() ?? { content: this.defaultReply };
  }

  private chunk(text: string): string[] {
    const chunks: string[] = [];
    for (let i = 0; i < text.length; i += this.streamChunkSize) {
      chunks.push(text.slice(i, i + this.streamChunkSize));
    }
    return chunks;
  }
}
