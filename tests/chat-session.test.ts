// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ChatSession, type TokenWriter } from '../src/cli/chat-session.js';
import { MockCompletionClient } from '../src/providers/mock.js';
import { CompletionUnavailableError } from '../src/errors.js';
import { ConversationHistory } from '../src/session.js';
import { createTestContext } from './helpers/context.js';

class BufferWriter implements TokenWriter {
  readonly chunks: string[] = [];
  onWrite: ((text: string) => void) | null = null;

  write(text: string): void {
    this.chunks.push(text);
    this.onWrite?.(text);
  }
}

describe('ChatSession', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('handleInput', () => {
    it('exits on a configured keyword regardless of case', async () => {
      const { ctx, client } = createTestContext();
      const session = new ChatSession(ctx);
      expect(await session.handleInput('  QUIT ')).toBe('exit');
      expect(client.getCallCount()).toBe(0);
    });

    it('ignores blank lines', async () => {
      const { ctx, client } = createTestContext();
      expect(await new ChatSession(ctx).handleInput('   ')).toBe('continue');
      expect(client.getCallCount()).toBe(0);
    });

    it('sends the whole history each turn', async () => {
      const { ctx, client } = createTestContext({
        client: new MockCompletionClient({ replies: ['first reply', 'second reply'] }),
      });
      const session = new ChatSession(ctx);

      await session.handleInput('hello');
      await session.handleInput('again');

      expect(client.getLastCall()?.messages).toEqual([
        { role: 'user', content: 'hello' },
        { role: 'assistant', content: 'first reply' },
        { role: 'user', content: 'again' },
      ]);
      expect(session.history.length).toBe(4);
    });
  });

  describe('streaming', () => {
    it('prints text tokens and stores the raw reply', async () => {
      const out = new BufferWriter();
      const { ctx } = createTestContext({
        client: new MockCompletionClient({ replies: [{ chunks: ['<thinking>', 'secret', '</thinking>', 'Answer'] }] }),
        config: { stream: true },
      });
      const session = new ChatSession(ctx, { out });

      expect(await session.turn('question')).toBe('<thinking>secret</thinking>Answer');

      const printed = out.chunks.join('');
      expect(printed).toContain('Answer');
      expect(printed).not.toContain('secret');
      expect(out.chunks[out.chunks.length - 1]).toBe('\n');
      expect(session.history.entries()[1]).toEqual({
        role: 'assistant',
        content: '<thinking>secret</thinking>Answer',
      });
    });

    it('hides a thought whose markers are split across tokens', async () => {
      const out = new BufferWriter();
      const { ctx } = createTestContext({
        client: new MockCompletionClient({
          replies: [{ chunks: ['Hi ', '<thi', 'nking>secret', '</', 'thinking>', 'Answer'] }],
        }),
        config: { stream: true },
      });

      await new ChatSession(ctx, { out }).turn('question');

      const printed = out.chunks.join('');
      expect(printed).toContain('Hi Answer\n');
      expect(printed).not.toContain('secret');
      expect(printed).not.toContain('<thi');
    });

    it('prints thought tokens when thoughts are shown', async () => {
      const out = new BufferWriter();
      const { ctx } = createTestContext({
        client: new MockCompletionClient({ replies: [{ chunks: ['<thinking>', 'secret', '</thinking>', 'Answer'] }] }),
        config: { stream: true, showThoughts: true },
      });

      await new ChatSession(ctx, { out }).turn('question');

      expect(out.chunks.join('')).toContain('secret');
    });

    it('keeps the user message when a reply is interrupted', async () => {
      const out = new BufferWriter();
      const { ctx } = createTestContext({
        client: new MockCompletionClient({ replies: [{ chunks: ['Hello', ' world', ' again'] }] }),
        config: { stream: true },
      });
      out.onWrite = text => {
        if (text === 'Hello') ctx.interrupts.interrupt();
      };
      const session = new ChatSession(ctx, { out });

      expect(await session.turn('question')).toBeNull();

      expect(out.chunks).not.toContain(' world');
      expect(session.history.entries()).toEqual([{ role: 'user', content: 'question' }]);
      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Response interrupted.'));
    });
  });

  it('reports a failed completion and carries on', async () => {
    const { ctx } = createTestContext({
      client: new MockCompletionClient({
        replies: [{ error: new CompletionUnavailableError('http://localhost:11434') }, 'back again'],
      }),
    });
    const session = new ChatSession(ctx);

    expect(await session.turn('first')).toBeNull();
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Cannot reach the model runtime at http://localhost:11434')
    );
    expect(await session.turn('second')).toBe('back again');
  });

  it('offers suggested commands through the gate', async () => {
    const { ctx, executed } = createTestContext({
      client: new MockCompletionClient({ replies: ['Check space:\nEXECUTE_COMMAND: df -h'] }),
      answers: ['yes'],
    });
    await new ChatSession(ctx).turn('disk full?');
    expect(executed).toEqual(['df -h']);
  });

  describe('chat commands', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'termsage-chat-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('saves and loads the conversation', async () => {
      const file = path.join(dir, 'saved.json');
      const { ctx } = createTestContext();
      const history = new ConversationHistory([
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
      ]);
      const session = new ChatSession(ctx, { history });

      await session.handleInput(`/save ${file}`);
      await session.handleInput('/clear');
      expect(session.history.length).toBe(0);

      await session.handleInput(`/load ${file}`);
      expect(session.history.entries()).toEqual([
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
      ]);
    });

    it('keeps the history when a load fails', async () => {
      const file = path.join(dir, 'bad.json');
      fs.writeFileSync(file, '{"not":"a list"}');
      const { ctx } = createTestContext();
      const session = new ChatSession(ctx, { history: new ConversationHistory([{ role: 'user', content: 'hi' }]) });

      await session.handleInput(`/load ${file}`);

      expect(session.history.length).toBe(1);
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Not a saved conversation'));
    });

    it('shows help for unknown commands without calling the model', async () => {
      const { ctx, client } = createTestContext();
      await new ChatSession(ctx).handleInput('/frobnicate');
      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Unknown command /frobnicate'));
      expect(client.getCallCount()).toBe(0);
    });
  });

  describe('start', () => {
    it('runs turns until an exit keyword', async () => {
      const { ctx, client } = createTestContext({ answers: ['hello', 'bye', 'never read'] });
      await new ChatSession(ctx).start();
      expect(client.getCallCount()).toBe(1);
      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Goodbye!'));
    });

    it('ends when input closes', async () => {
      const { ctx, input } = createTestContext({ answers: ['hello'] });
      await new ChatSession(ctx).start();
      expect(input.prompts).toHaveLength(2);
    });
  });
});
