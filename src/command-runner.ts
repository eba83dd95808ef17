// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Runs a single shell command as an isolated subprocess with a wall-clock timeout.
 * Failures are reported in the result, never thrown.
 */

import { execFile } from 'node:child_process';
import { COMMAND_CONFIG } from './constants.js';
import { CommandSpawnError, CommandTimeoutError } from './errors.js';
import type { CommandResult } from './types.js';

/**
 * Error shape produced by execFile.
 */
export interface ExecFailure extends Error {
  code?: string | number | null;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
}

export interface ExecOptions {
  timeout: number;
  maxBuffer: number;
  signal?: AbortSignal;
  cwd?: string;
}

export type ExecFileFn = (
  file: string,
  args: string[],
  options: ExecOptions,
  callback: (error: ExecFailure | null, stdout: string, stderr: string) => void
) => void;

const defaultExecFile: ExecFileFn = (file, args, options, callback) => {
  execFile(file, args, { ...options, encoding: 'utf8' }, (error, stdout, stderr) => {
    callback(error, stdout, stderr);
  });
};

export interface CommandRunnerOptions {
  timeoutSeconds?: number;
  cwd?: string;
  shell?: string;
  exec?: ExecFileFn;
}

export class CommandRunner {
  readonly timeoutSeconds: number;
  private readonly cwd: string | undefined;
  private readonly shell: string;
  private readonly exec: ExecFileFn;

  constructor(options: CommandRunnerOptions = {}) {
    // execFile treats a zero timeout as unlimited
    this.timeoutSeconds =
      options.timeoutSeconds !== undefined && options.timeoutSeconds > 0
        ? options.timeoutSeconds
        : COMMAND_CONFIG.TIMEOUT_SECONDS;
    this.cwd = options.cwd;
    this.shell = options.shell ?? (process.platform === 'win32' ? process.env.ComSpec || 'cmd.exe' : 'sh');
    this.exec = options.exec ?? defaultExecFile;
  }

  /**
   * Run a command and wait for it to finish.
   * An aborted signal kills the child so nothing is left running; a signal that is
   * already aborted never spawns one.
   */
  run(command: string, signal?: AbortSignal): Promise<CommandResult> {
    const startTime = Date.now();
    const args = this.shell.toLowerCase().endsWith('cmd.exe') ? ['/C', command] : ['-c', command];

    if (signal?.aborted) {
      return Promise.resolve<CommandResult>({
        status: 'aborted',
        exitCode: null,
        stdout: '',
        stderr: '',
        durationMs: 0,
        error: 'Command aborted',
      });
    }

    return new Promise<CommandResult>(resolve => {
      try {
        this.exec(
          this.shell,
          args,
          {
            timeout: this.timeoutSeconds * 1000,
            maxBuffer: COMMAND_CONFIG.MAX_BUFFER,
            signal,
            cwd: this.cwd,
          },
          (error, stdout, stderr) => {
            resolve(this.toResult(command, error, stdout, stderr, Date.now() - startTime, signal));
          }
        );
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        resolve({
          status: 'spawn-error',
          exitCode: null,
          stdout: '',
          stderr: '',
          durationMs: Date.now() - startTime,
          error: new CommandSpawnError(command, detail).message,
        });
      }
    });
  }

  private toResult(
    command: string,
    error: ExecFailure | null,
    stdout: string,
    stderr: string,
    durationMs: number,
    signal?: AbortSignal
  ): CommandResult {
    if (!error) {
      return { status: 'success', exitCode: 0, stdout, stderr, durationMs };
    }

    if (signal?.aborted || error.name === 'AbortError') {
      return { status: 'aborted', exitCode: null, stdout, stderr, durationMs, error: 'Command aborted' };
    }

    if (error.killed && error.signal === 'SIGTERM') {
      return {
        status: 'timeout',
        exitCode: null,
        stdout,
        stderr,
        durationMs,
        error: new CommandTimeoutError(command, this.timeoutSeconds).message,
      };
    }

    if (typeof error.code === 'number') {
      return { status: 'failed', exitCode: error.code, stdout, stderr, durationMs };
    }

    return {
      status: 'spawn-error',
      exitCode: null,
      stdout,
      stderr,
      durationMs,
      error: new CommandSpawnError(command, error.message).message,
    };
  }
}
