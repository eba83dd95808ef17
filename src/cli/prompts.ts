// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Prompt templates for the single-shot operations.
 */

import * as path from 'path';
import { COMMAND_MARKER } from '../constants.js';

export const DEFAULT_ANALYSIS_PROMPT =
  'Analyze this code and provide insights about its structure, functionality, and potential improvements.';

/**
 * Language tag for a fenced block, from the file extension.
 */
export function fenceLanguage(filePath: string): string {
  const ext = path.extname(filePath);
  return ext ? ext.slice(1) : 'text';
}

export function buildAnalysisPrompt(filePath: string, content: string, prompt?: string): string {
  return `File: ${filePath}
Content:
\`\`\`${fenceLanguage(filePath)}
${content}
\`\`\`

${prompt || DEFAULT_ANALYSIS_PROMPT}`;
}

/**
 * Strict edit prompt. The reply is meant to be written to disk as-is, so the
 * model is told to return nothing but the file.
 */
export function buildEditPrompt(filePath: string, content: string, instruction: string): string {
  return `You are a code editor. Your task is to modify the file according to the instruction.

CRITICAL RULES:
1. Return ONLY the complete modified file content
2. Do NOT include any explanations, thoughts, or markdown formatting
3. Do NOT wrap the code in backticks or code blocks
4. Do NOT add prefixes like "Here's the modified file:"
5. Start directly with the actual file content

File: ${filePath}
Current content:
---START FILE---
${content}
---END FILE---

Instruction: ${instruction}

Return the complete modified file content below (no formatting, no explanations):
`;
}

export const SYSTEM_ASSISTANT_PROMPT = `You are a helpful Linux system assistant.
Provide clear, practical answers about system administration, troubleshooting, and best practices.
Focus on actionable solutions and explain commands clearly.
When a shell command would help, put each one on its own line in the form:
${COMMAND_MARKER} <command>
Only suggest commands the user can review before running.`;

export function buildSystemPrompt(question: string): string {
  return `${SYSTEM_ASSISTANT_PROMPT}\n\nQuestion: ${question}`;
}
