// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  coerceConfigLayer,
  DEFAULT_CONFIG,
  loadConfigFile,
  loadEnvConfig,
  mergeConfig,
  resolveConfig,
  validateConfig,
  WORKSPACE_CONFIG_FILE,
} from '../src/config/index.js';

describe('loadEnvConfig', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns an empty layer for an empty environment', () => {
    expect(loadEnvConfig({})).toEqual({});
  });

  it('reads every supported variable', () => {
    expect(
      loadEnvConfig({
        DEFAULT_MODEL: 'llama3',
        OLLAMA_HOST: 'http://gpu-box:11434',
        COMMAND_TIMEOUT: '45',
        MAX_PREVIEW_SIZE: '500',
        CREATE_BACKUPS: 'TRUE',
        SUDO_PREFIXES: 'sudo, doas ,,',
        EXIT_COMMANDS: 'exit,Later',
      })
    ).toEqual({
      model: 'llama3',
      baseUrl: 'http://gpu-box:11434',
      timeoutSeconds: 45,
      previewSizeThreshold: 500,
      createBackups: true,
      elevationPrefixes: ['sudo', 'doas'],
      exitKeywords: ['exit', 'Later'],
    });
  });

  it('treats anything but "true" as disabling backups', () => {
    expect(loadEnvConfig({ CREATE_BACKUPS: 'yes' })).toEqual({ createBackups: false });
  });

  it('ignores numbers that do not parse', () => {
    expect(loadEnvConfig({ COMMAND_TIMEOUT: 'soon', MAX_PREVIEW_SIZE: '' })).toEqual({});
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it.each(['0', '-5'])('ignores a command timeout of %s', value => {
    expect(loadEnvConfig({ COMMAND_TIMEOUT: value })).toEqual({});
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});

describe('coerceConfigLayer', () => {
  it('keeps well-typed fields', () => {
    const { layer, warnings } = coerceConfigLayer(
      { model: 'mistral', timeoutSeconds: 10, stream: false, exitKeywords: ['q'] },
      'cfg.json'
    );
    expect(layer).toEqual({ model: 'mistral', timeoutSeconds: 10, stream: false, exitKeywords: ['q'] });
    expect(warnings).toEqual([]);
  });

  it('drops wrong types and unknown keys with warnings', () => {
    const { layer, warnings } = coerceConfigLayer(
      { timeoutSeconds: '10', elevationPrefixes: [1], colour: 'red' },
      'cfg.json'
    );
    expect(layer).toEqual({});
    expect(warnings).toEqual([
      'cfg.json: "timeoutSeconds" should be a positive number',
      'cfg.json: "elevationPrefixes" should be an array of strings',
      'cfg.json: unknown option "colour"',
    ]);
  });

  it('drops a timeout that is not positive', () => {
    expect(coerceConfigLayer({ timeoutSeconds: 0 }, 'cfg.json')).toEqual({
      layer: {},
      warnings: ['cfg.json: "timeoutSeconds" should be a positive number'],
    });
  });

  it('rejects non-objects', () => {
    expect(coerceConfigLayer([1, 2], 'cfg.json')).toEqual({
      layer: {},
      warnings: ['cfg.json: expected a JSON object'],
    });
  });
});

describe('mergeConfig', () => {
  it('returns defaults without layers', () => {
    expect(mergeConfig([])).toEqual(DEFAULT_CONFIG);
  });

  it('applies layers in order, then CLI options', () => {
    const config = mergeConfig(
      [{ model: 'env-model', timeoutSeconds: 10 }, null, { model: 'workspace-model', exitKeywords: ['Quit'] }],
      { timeout: 5, stream: false, backup: false, baseUrl: 'http://remote:11434/' }
    );
    expect(config).toMatchObject({
      model: 'workspace-model',
      timeoutSeconds: 5,
      stream: false,
      createBackups: false,
      exitKeywords: ['quit'],
      baseUrl: 'http://remote:11434',
    });
  });

  it('keeps a bounded timeout when a layer or flag is not positive', () => {
    const config = mergeConfig([{ timeoutSeconds: 12 }, { timeoutSeconds: 0 }, { timeoutSeconds: -3 }], {
      timeout: 0,
    });
    expect(config.timeoutSeconds).toBe(12);
    expect(mergeConfig([{ timeoutSeconds: 0 }]).timeoutSeconds).toBe(DEFAULT_CONFIG.timeoutSeconds);
  });

  it('does not share default arrays between results', () => {
    const first = mergeConfig([]);
    first.exitKeywords.push('later');
    expect(mergeConfig([]).exitKeywords).toEqual(['exit', 'quit', 'bye', 'goodbye']);
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual([]);
  });

  it('notes that an empty elevation prefix is ignored', () => {
    expect(validateConfig({ ...DEFAULT_CONFIG, elevationPrefixes: ['sudo', ''] })).toEqual([
      'elevationPrefixes contains an empty prefix, which is ignored',
    ]);
  });

  it('reports each invalid option', () => {
    expect(
      validateConfig({
        ...DEFAULT_CONFIG,
        baseUrl: 'localhost:11434',
        timeoutSeconds: 0,
        previewSizeThreshold: -1,
        exitKeywords: [],
        elevationPrefixes: ['sudo', ' '],
      })
    ).toHaveLength(5);
  });
});

describe('config files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'termsage-config-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('yields no layer for a missing file', () => {
    expect(loadConfigFile(path.join(dir, 'none.json'))).toEqual({ config: null, configPath: null });
  });

  it('ignores a file that is not JSON', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ not json');
    expect(loadConfigFile(file)).toEqual({ config: null, configPath: file });
    expect(console.warn).toHaveBeenCalled();
  });

  it('resolves env, global and workspace layers in priority order', () => {
    const globalPath = path.join(dir, 'global.json');
    fs.writeFileSync(globalPath, JSON.stringify({ model: 'global-model', timeoutSeconds: 20, showThoughts: true }));
    fs.writeFileSync(path.join(dir, WORKSPACE_CONFIG_FILE), JSON.stringify({ timeoutSeconds: 60 }));

    const { config, warnings } = resolveConfig({
      cwd: dir,
      env: { DEFAULT_MODEL: 'env-model', MAX_PREVIEW_SIZE: '100' },
      globalConfigPath: globalPath,
    });

    expect(warnings).toEqual([]);
    expect(config).toMatchObject({
      model: 'global-model',
      timeoutSeconds: 60,
      previewSizeThreshold: 100,
      showThoughts: true,
    });
  });
});
