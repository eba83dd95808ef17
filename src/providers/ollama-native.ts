/**
 * Ollama client over the native HTTP API (/api/chat, /api/tags).
 */

import {
  CompletionUnavailableError,
  ModelUnavailableError,
  isAbortError,
} from '../errors.js';
import { logger } from '../logger.js';
import type { Message } from '../types.js';
import type { CompletionClient } from './base.js';

interface OllamaChatRequest {
  model: string;
  messages: Message[];
  stream: boolean;
}

function field(data: unknown, key: string): unknown {
  if (typeof data !== 'object' || data === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(data, key);
  return value;
}

/**
 * Pull `message.content` out of a chat response object.
 */
function messageContent(data: unknown): string {
  const content = field(field(data, 'message'), 'content');
  return typeof content === 'string' ? content : '';
}

function errorText(data: unknown): string | undefined {
  const error = field(data, 'error');
  return typeof error === 'string' ? error : undefined;
}

export class OllamaClient implements CompletionClient {
  private readonly baseUrl: string;

  constructor(baseUrl: string = 'http://localhost:11434') {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async complete(modelId: string, messages: Message[], signal?: AbortSignal): Promise<string> {
    const started = Date.now();
    logger.apiRequest(modelId, messages, false);

    const response = await this.post(modelId, { model: modelId, messages, stream: false }, signal);
    const data: unknown = await response.json();
    this.checkBodyError(modelId, data);

    const content = messageContent(data);
    logger.apiResponse(content, (Date.now() - started) / 1000);
    return content;
  }

  async *completeStreaming(modelId: string, messages: Message[], signal?: AbortSignal): AsyncGenerator<string> {
    const started = Date.now();
    logger.apiRequest(modelId, messages, true);

    const response = await this.post(modelId, { model: modelId, messages, stream: true }, signal);
    if (!response.body) {
      throw new CompletionUnavailableError(this.baseUrl, 'response had no body');
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let pending = '';
    let fullText = '';
    let readerDone = false;
    let finished = false;

    try {
      while (!finished) {
        const { done, value } = await reader.read();
        if (done) {
          pending += decoder.decode();
          readerDone = true;
          finished = true;
        } else {
          pending += decoder.decode(value, { stream: true });
        }

        // NDJSON: a line may be split across chunks, keep the tail for later
        const lines = pending.split('\n');
        pending = finished ? '' : lines.pop() ?? '';

        for (const line of lines) {
          if (!line.trim()) continue;

          let data: unknown;
          try {
            data = JSON.parse(line);
          } catch {
            logger.debug(`Skipping malformed stream line: ${line.slice(0, 80)}`);
            continue;
          }

          this.checkBodyError(modelId, data);
          const token = messageContent(data);
          if (token) {
            fullText += token;
            yield token;
          }
          if (field(data, 'done') === true) {
            finished = true;
            break;
          }
        }
      }
    } finally {
      if (!readerDone) {
        await reader.cancel().catch((error: unknown) => {
          logger.debug(`Stream cancel failed: ${error instanceof Error ? error.message : String(error)}`);
        });
      }
    }

    logger.apiResponse(fullText, (Date.now() - started) / 1000);
  }

  async listModels(): Promise<string[]> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/tags`);
    } catch (error) {
      throw this.unavailable(error);
    }
    if (!response.ok) {
      throw new CompletionUnavailableError(this.baseUrl, `HTTP ${response.status} ${response.statusText}`);
    }

    const data: unknown = await response.json();
    const models = field(data, 'models');
    if (!Array.isArray(models)) {
      return [];
    }
    const names: string[] = [];
    for (const model of models) {
      const name: unknown = field(model, 'name');
      if (typeof name === 'string') names.push(name);
    }
    return names;
  }

  private async post(modelId: string, body: OllamaChatRequest, signal?: AbortSignal): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      if (isAbortError(error)) throw error;
      throw this.unavailable(error);
    }

    if (response.ok) {
      return response;
    }

    const text = await response.text();
    if (response.status === 404 || /not found/i.test(text)) {
      throw new ModelUnavailableError(modelId);
    }
    throw new CompletionUnavailableError(this.baseUrl, `HTTP ${response.status} ${response.statusText}`);
  }

  private checkBodyError(modelId: string, data: unknown): void {
    const error = errorText(data);
    if (error === undefined) return;
    if (/not found/i.test(error)) {
      throw new ModelUnavailableError(modelId);
    }
    throw new CompletionUnavailableError(this.baseUrl, error);
  }

  private unavailable(error: unknown): CompletionUnavailableError {
    let detail = error instanceof Error ? error.message : String(error);
    if (error instanceof Error && error.cause instanceof Error) {
      detail = error.cause.message;
    }
    return new CompletionUnavailableError(this.baseUrl, detail);
  }
}
