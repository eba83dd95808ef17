// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  ConversationHistory,
  defaultConversationFile,
  loadConversation,
  parseConversation,
  saveConversation,
} from '../src/session.js';
import { InvalidConversationError } from '../src/errors.js';

describe('ConversationHistory', () => {
  it('appends turns in order', () => {
    const history = new ConversationHistory();
    history.append('user', 'hi');
    history.append('assistant', 'hello');
    expect(history.length).toBe(2);
    expect(history.toMessages()).toEqual([
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello' },
    ]);
  });

  it('hands out copies', () => {
    const history = new ConversationHistory([{ role: 'user', content: 'hi' }]);
    history.entries()[0].content = 'changed';
    expect(history.entries()[0].content).toBe('hi');
  });

  it('clears and replaces', () => {
    const history = new ConversationHistory([{ role: 'user', content: 'hi' }]);
    history.clear();
    expect(history.length).toBe(0);
    history.replace([{ role: 'assistant', content: 'x' }]);
    expect(history.entries()).toEqual([{ role: 'assistant', content: 'x' }]);
  });
});

describe('defaultConversationFile', () => {
  it('uses a local timestamp', () => {
    expect(defaultConversationFile(new Date(2026, 2, 14, 9, 30, 5))).toBe('chat_20260314_093005.json');
  });
});

describe('parseConversation', () => {
  it('accepts an array of user/assistant messages', () => {
    expect(parseConversation('[{"role":"user","content":"a"},{"role":"assistant","content":"b","extra":1}]')).toEqual([
      { role: 'user', content: 'a' },
      { role: 'assistant', content: 'b' },
    ]);
  });

  it('rejects invalid JSON', () => {
    expect(() => parseConversation('{oops', 'bad.json')).toThrow(InvalidConversationError);
  });

  it('rejects a non-array', () => {
    expect(() => parseConversation('{}', 'obj.json')).toThrow('Not a saved conversation: obj.json (expected a JSON array)');
  });

  it('rejects entries with another role', () => {
    expect(() => parseConversation('[{"role":"user","content":"a"},{"role":"system","content":"b"}]', 'x.json')).toThrow(
      'Not a saved conversation: x.json (entry 2 is not a user/assistant message)'
    );
  });
});

describe('saveConversation / loadConversation', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'termsage-session-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('round-trips a history through a nested path', () => {
    const history = new ConversationHistory([
      { role: 'user', content: 'question' },
      { role: 'assistant', content: 'answer\nwith lines' },
    ]);
    const target = path.join(dir, 'nested', 'chat.json');

    expect(saveConversation(history, target)).toBe(target);
    expect(fs.readFileSync(target, 'utf-8')).toBe(JSON.stringify(history.entries(), null, 2));
    expect(loadConversation(target)).toEqual(history.entries());
  });
});
