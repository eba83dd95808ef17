// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 */

/**
 * A partial configuration layer, as read from the environment or a JSON file
 * (~/.termsage/config.json or .termsage.json in the working directory).
 */
export interface ConfigLayer {
  /** Model to use; prompts for one when unset */
  model?: string;

  /** Model runtime base URL */
  baseUrl?: string;

  /** Wall-clock limit per executed command, in seconds */
  timeoutSeconds?: number;

  /** Files shorter than this (in characters) get a preview panel */
  previewSizeThreshold?: number;

  /** Write `<file>.backup` before overwriting an edited file */
  createBackups?: boolean;

  /** Commands starting with any of these are flagged as needing elevation */
  elevationPrefixes?: string[];

  /** Chat input that ends the session */
  exitKeywords?: string[];

  /** Include thought segments in displayed responses */
  showThoughts?: boolean;

  /** Print tokens as they arrive */
  stream?: boolean;
}

/**
 * Fully resolved configuration, built once at startup and passed to each component.
 */
export interface AssistantConfig {
  model?: string;
  baseUrl: string;
  timeoutSeconds: number;
  previewSizeThreshold: number;
  createBackups: boolean;
  elevationPrefixes: string[];
  exitKeywords: string[];
  showThoughts: boolean;
  stream: boolean;
}
