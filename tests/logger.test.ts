// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { logger, LogLevel, parseLogLevel } from '../src/logger.js';
import type { CommandResult } from '../src/types.js';

describe('Logger', () => {
  beforeEach(() => {
    // Reset logger to NORMAL level before each test
    logger.setLevel(LogLevel.NORMAL);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    logger.setLevel(LogLevel.NORMAL);
    vi.restoreAllMocks();
  });

  describe('parseLogLevel', () => {
    it('returns NORMAL when no flags set', () => {
      expect(parseLogLevel({})).toBe(LogLevel.NORMAL);
    });

    it('returns VERBOSE when verbose flag set', () => {
      expect(parseLogLevel({ verbose: true })).toBe(LogLevel.VERBOSE);
    });

    it('returns DEBUG when debug flag set', () => {
      expect(parseLogLevel({ debug: true })).toBe(LogLevel.DEBUG);
    });

    it('trace takes precedence over debug and verbose', () => {
      expect(parseLogLevel({ trace: true, debug: true, verbose: true })).toBe(LogLevel.TRACE);
    });
  });

  describe('setLevel', () => {
    it('starts at NORMAL and can be raised', () => {
      expect(logger.getLevel()).toBe(LogLevel.NORMAL);
      logger.setLevel(LogLevel.TRACE);
      expect(logger.getLevel()).toBe(LogLevel.TRACE);
    });
  });

  describe('debug', () => {
    it('logs at DEBUG level', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.debug('test message');
      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('[Debug] test message'));
    });

    it('does not log at VERBOSE level', () => {
      logger.setLevel(LogLevel.VERBOSE);
      logger.debug('test message');
      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('apiRequest', () => {
    it('summarizes the request at DEBUG level', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.apiRequest('llama3', [{ role: 'user', content: 'hi' }], true);
      expect(console.log).toHaveBeenCalledTimes(1);
      expect(console.log).toHaveBeenCalledWith(
        expect.stringContaining('[API] Sending to llama3 (1 messages, streaming)...')
      );
    });

    it('prints message payloads on a single line at TRACE level', () => {
      logger.setLevel(LogLevel.TRACE);
      logger.apiRequest('llama3', [{ role: 'user', content: 'line1\nline2' }], false);
      expect(console.log).toHaveBeenCalledWith(
        expect.stringContaining('{ role: "user", content: "line1\\nline2" }')
      );
    });
  });

  describe('apiResponse', () => {
    it('reports length and duration at DEBUG level', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.apiResponse('hello', 1.5);
      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('[API] Response: 5 chars, 1.50s'));
    });
  });

  describe('commandOutcome', () => {
    const failed: CommandResult = { status: 'timeout', exitCode: null, stdout: '', stderr: '', durationMs: 2000 };

    it('logs at VERBOSE level with the status', () => {
      logger.setLevel(LogLevel.VERBOSE);
      logger.commandOutcome('sleep 60', failed);
      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('(timeout, 2.00s)'));
    });

    it('does not log at NORMAL level', () => {
      logger.commandOutcome('sleep 60', failed);
      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('sanitization', () => {
    it('logs the verdict and each warning at DEBUG level', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.sanitization(120, {
        valid: true,
        content: 'x'.repeat(60),
        reason: 'ok',
        warnings: ['No Python keywords found in cleaned content'],
      });
      expect(console.log).toHaveBeenCalledTimes(2);
      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('[Sanitize] accepted: 120 → 60 chars (ok)'));
    });
  });

  describe('error', () => {
    it('always logs errors', () => {
      logger.error('test error');
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Error: test error'));
    });

    it('includes stack trace at DEBUG level', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.error('test error', new Error('test'));
      expect(console.error).toHaveBeenCalledTimes(2);
    });
  });

  describe('warn', () => {
    it('always logs warnings', () => {
      logger.warn('careful');
      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('Warning: careful'));
    });
  });
});
