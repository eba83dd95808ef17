// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { editFile, withTrailingNewline } from '../src/cli/file-edit.js';
import { analyzeFile } from '../src/cli/file-analysis.js';
import { MockCompletionClient } from '../src/providers/mock.js';
import { ModelUnavailableError } from '../src/errors.js';
import { createTestContext } from './helpers/context.js';

describe('withTrailingNewline', () => {
  it('restores the final newline of the original', () => {
    expect(withTrailingNewline('a', 'x\n')).toBe('a\n');
    expect(withTrailingNewline('a', 'x\r\n')).toBe('a\r\n');
    expect(withTrailingNewline('a', 'x')).toBe('a');
    expect(withTrailingNewline('a\n', 'x\n')).toBe('a\n');
  });
});

describe('file operations', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'termsage-edit-'));
    file = path.join(dir, 'calc.py');
    fs.writeFileSync(file, 'def add(a, b):\n    return a - b\n');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('editFile', () => {
    it('writes the cleaned reply and keeps a backup', async () => {
      const client = new MockCompletionClient({
        replies: ["Here's the fixed file:\n```python\ndef add(a, b):\n    return a + b\n```\n\nThis fixes the sign."],
      });
      const { ctx } = createTestContext({ client });

      const outcome = await editFile(ctx, file, 'fix the bug');

      expect(outcome.status).toBe('written');
      expect(fs.readFileSync(file, 'utf-8')).toBe('def add(a, b):\n    return a + b\n');
      expect(fs.readFileSync(`${file}.backup`, 'utf-8')).toBe('def add(a, b):\n    return a - b\n');
      if (outcome.status === 'written') {
        expect(outcome.backupPath).toBe(`${file}.backup`);
        expect(outcome.diff.summary).toBe('-1, +1 lines');
      }
      expect(client.getLastCall()?.messages[0].content).toContain('Instruction: fix the bug');
    });

    it('leaves the file untouched when the reply is rejected', async () => {
      const raw = '<thinking>I am not sure what to change here</thinking>';
      const { ctx } = createTestContext({ client: new MockCompletionClient({ replies: [raw] }) });

      const outcome = await editFile(ctx, file, 'fix the bug');

      expect(outcome).toMatchObject({ status: 'rejected', rawResponse: raw });
      expect(fs.readFileSync(file, 'utf-8')).toBe('def add(a, b):\n    return a - b\n');
      expect(fs.existsSync(`${file}.backup`)).toBe(false);
      expect(console.log).toHaveBeenCalledWith(expect.stringContaining(raw));
    });

    it('reports an identical reply as unchanged', async () => {
      const { ctx } = createTestContext({
        client: new MockCompletionClient({ replies: ['def add(a, b):\n    return a - b'] }),
      });
      expect((await editFile(ctx, file, 'nothing')).status).toBe('unchanged');
      expect(fs.existsSync(`${file}.backup`)).toBe(false);
    });

    it('skips the backup when backups are disabled', async () => {
      const { ctx } = createTestContext({
        client: new MockCompletionClient({ replies: ['def add(a, b):\n    return b + a'] }),
        config: { createBackups: false },
      });
      const outcome = await editFile(ctx, file, 'swap');
      expect(outcome).toMatchObject({ status: 'written', backupPath: null });
      expect(fs.existsSync(`${file}.backup`)).toBe(false);
    });

    it('fails without calling the model when the file cannot be read', async () => {
      const { ctx, client } = createTestContext();
      const outcome = await editFile(ctx, path.join(dir, 'missing.py'), 'fix');
      expect(outcome.status).toBe('failed');
      expect(client.getCallCount()).toBe(0);
    });

    it('fails when the model is unavailable', async () => {
      const { ctx } = createTestContext({
        client: new MockCompletionClient({ replies: [{ error: new ModelUnavailableError('mock-model') }] }),
      });
      const outcome = await editFile(ctx, file, 'fix');
      expect(outcome).toMatchObject({ status: 'failed' });
      expect(fs.readFileSync(file, 'utf-8')).toBe('def add(a, b):\n    return a - b\n');
    });

    it('reports a cancelled request', async () => {
      const abort = Object.assign(new Error('aborted'), { name: 'AbortError' });
      const { ctx } = createTestContext({ client: new MockCompletionClient({ replies: [{ error: abort }] }) });
      expect(await editFile(ctx, file, 'fix')).toEqual({ status: 'cancelled' });
    });
  });

  describe('analyzeFile', () => {
    it('sends the file with the prompt and returns the reply', async () => {
      const { ctx, client } = createTestContext({
        client: new MockCompletionClient({ replies: ['It subtracts instead of adding.'] }),
      });

      expect(await analyzeFile(ctx, file, 'What is wrong?')).toBe('It subtracts instead of adding.');
      const sent = client.getLastCall()?.messages[0].content ?? '';
      expect(sent).toContain('```py\ndef add(a, b):\n    return a - b\n\n```');
      expect(sent.endsWith('What is wrong?')).toBe(true);
    });

    it('returns null for a missing file', async () => {
      const { ctx } = createTestContext();
      expect(await analyzeFile(ctx, path.join(dir, 'nope.py'))).toBeNull();
    });
  });
});
