// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import * as fs from 'fs';
import * as path from 'path';
import { InvalidConversationError } from './errors.js';
import { ensureDir } from './paths.js';
import type { ConversationEntry, ConversationRole, Message } from './types.js';

/**
 * Append-only record of a chat session's turns.
 */
export class ConversationHistory {
  private items: ConversationEntry[] = [];

  constructor(entries: ConversationEntry[] = []) {
    this.items = entries.map(entry => ({ ...entry }));
  }

  append(role: ConversationRole, content: string): void {
    this.items.push({ role, content });
  }

  /**
   * Copy of the entries, oldest first.
   */
  entries(): ConversationEntry[] {
    return this.items.map(entry => ({ ...entry }));
  }

  /**
   * Entries as messages for the completion client.
   */
  toMessages(): Message[] {
    return this.entries();
  }

  get length(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }

  /**
   * Replace the whole history (used by /load).
   */
  replace(entries: ConversationEntry[]): void {
    this.items = entries.map(entry => ({ ...entry }));
  }
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Default file name for a saved conversation, e.g. chat_20260314_093005.json.
 */
export function defaultConversationFile(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `chat_${date}_${time}.json`;
}

/**
 * Write the history as a JSON array. Returns the path written.
 */
export function saveConversation(history: ConversationHistory, filePath?: string): string {
  const target = filePath || defaultConversationFile();
  ensureDir(path.dirname(target));
  fs.writeFileSync(target, JSON.stringify(history.entries(), null, 2), 'utf-8');
  return target;
}

function isConversationEntry(value: unknown): value is ConversationEntry {
  if (typeof value !== 'object' || value === null || !('role' in value) || !('content' in value)) {
    return false;
  }
  return (value.role === 'user' || value.role === 'assistant') && typeof value.content === 'string';
}

/**
 * Parse saved conversation JSON, validating every entry.
 */
export function parseConversation(json: string, source: string = '<input>'): ConversationEntry[] {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new InvalidConversationError(source, error instanceof Error ? error.message : 'invalid JSON');
  }

  if (!Array.isArray(data)) {
    throw new InvalidConversationError(source, 'expected a JSON array');
  }

  const entries: ConversationEntry[] = [];
  for (let i = 0; i < data.length; i++) {
    const item: unknown = data[i];
    if (!isConversationEntry(item)) {
      throw new InvalidConversationError(source, `entry ${i + 1} is not a user/assistant message`);
    }
    entries.push({ role: item.role, content: item.content });
  }
  return entries;
}

/**
 * Read a conversation saved by saveConversation().
 */
export function loadConversation(filePath: string): ConversationEntry[] {
  const json = fs.readFileSync(filePath, 'utf-8');
  return parseConversation(json, filePath);
}
