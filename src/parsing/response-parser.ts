/**
 * Response parser for raw model output.
 * Splits a response into thought, code, command and text segments using the
 * thought markers of the model family it came from.
 */

import { COMMAND_MARKER, THOUGHT_WRAPPER_TAGS } from '../constants.js';
import { segment, type ResponseSegment } from '../types.js';
import { compileThoughtPatterns, detectModelFamily, type ModelFamily } from './model-family.js';

const CODE_FENCE_PATTERN = /```(\w+)?\n([\s\S]*?)```/g;
const JSON_FENCE_PATTERN = /```json\n([\s\S]*?)```/g;
const SHELL_PROMPT_PATTERN = /^\$\s+(.+)$/;
const TABLE_PATTERN = /\|.*\|.*\|/;

function wrapperPatterns(): RegExp[] {
  return THOUGHT_WRAPPER_TAGS.map(tag => new RegExp(`<${tag}>([\\s\\S]*?)</${tag}>`, 'gi'));
}

/** Captured group when the pattern has one, whole match otherwise */
function collect(text: string, pattern: RegExp): string[] {
  return [...text.matchAll(pattern)].map(match => (match.length > 1 ? (match[1] ?? '') : match[0]));
}

/**
 * Structured data found inside a response.
 */
export interface StructuredData {
  /** Every ```json block that parsed */
  json?: unknown[];
  /** Runs of consecutive lines containing `|` */
  tables?: string[][];
}

export class ResponseParser {
  readonly family: ModelFamily;
  readonly modelName: string;

  constructor(modelName?: string | null) {
    this.modelName = modelName || 'default';
    this.family = detectModelFamily(modelName);
  }

  /**
   * Parse a raw response into segments.
   * Never throws; an empty list means there is nothing to show.
   */
  parse(response: string): ResponseSegment[] {
    const segments: ResponseSegment[] = [];

    const { thoughts, remaining } = this.splitThoughts(response);
    if (thoughts.length > 0) {
      segments.push(segment('thought', thoughts.join('\n')));
    }

    const { segments: codeSegments, remaining: withoutCode } = extractCodeBlocks(remaining);
    segments.push(...codeSegments);

    const { segments: commandSegments, remaining: withoutCommands } = extractCommandLines(withoutCode);
    segments.push(...commandSegments);

    const text = withoutCommands.trim();
    if (text) {
      segments.push(segment('text', text));
    }

    return segments;
  }

  /**
   * Every family pattern is matched against the full text before any span is
   * stripped. The generic wrapper tags then run on what is left, one at a time.
   */
  private splitThoughts(text: string): { thoughts: string[]; remaining: string } {
    const familyPatterns = compileThoughtPatterns(this.family);
    const thoughts = familyPatterns.flatMap(pattern => collect(text, pattern));

    let remaining = text;
    for (const pattern of familyPatterns) {
      remaining = remaining.replace(pattern, '');
    }
    for (const pattern of wrapperPatterns()) {
      thoughts.push(...collect(remaining, pattern));
      remaining = remaining.replace(pattern, '');
    }
    return { thoughts, remaining };
  }

  /**
   * Pull JSON blocks and pipe tables out of a response.
   */
  extractStructuredData(response: string): StructuredData {
    const data: StructuredData = {};

    const parsed: unknown[] = [];
    for (const match of response.matchAll(JSON_FENCE_PATTERN)) {
      try {
        parsed.push(JSON.parse(match[1] ?? ''));
      } catch {
        // Not valid JSON; leave it out
      }
    }
    if (parsed.length > 0) {
      data.json = parsed;
    }

    if (TABLE_PATTERN.test(response)) {
      const tables: string[][] = [];
      let current: string[] = [];
      for (const line of response.split('\n')) {
        if (line.includes('|')) {
          current.push(line);
        } else if (current.length > 0) {
          tables.push(current);
          current = [];
        }
      }
      if (current.length > 0) {
        tables.push(current);
      }
      if (tables.length > 0) {
        data.tables = tables;
      }
    }

    return data;
  }
}

/**
 * Extract fenced code blocks.
 * Each matched region is removed by exact-substring replace of the matched text,
 * one occurrence per match, left to right.
 */
export function extractCodeBlocks(text: string): { segments: ResponseSegment[]; remaining: string } {
  const segments: ResponseSegment[] = [];
  let remaining = text;

  for (const match of text.matchAll(CODE_FENCE_PATTERN)) {
    const language = match[1] || 'text';
    const body = (match[2] ?? '').trim();
    segments.push(segment('code', body, { language }));
    remaining = remaining.replace(match[0], () => '');
  }

  return { segments, remaining };
}

/**
 * Extract command lines.
 * `EXECUTE_COMMAND:` lines become command segments and are removed; `$ cmd` lines are
 * classified for display only and stay in the text.
 */
export function extractCommandLines(text: string): { segments: ResponseSegment[]; remaining: string } {
  const segments: ResponseSegment[] = [];
  const kept: string[] = [];

  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.startsWith(COMMAND_MARKER)) {
      const command = trimmed.slice(COMMAND_MARKER.length).trim();
      if (command) {
        segments.push(segment('command', command, { source: 'marker' }));
      }
      continue;
    }

    const prompt = SHELL_PROMPT_PATTERN.exec(line);
    if (prompt?.[1]) {
      segments.push(segment('command', prompt[1], { source: 'shell-prompt' }));
    }
    kept.push(line);
  }

  return { segments, remaining: kept.join('\n') };
}
