// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Streaming response classification.
 *
 * Tokens arrive in order and are split at thought marker boundaries as they come.
 * A marker may be split across tokens, so a trailing piece that could still grow
 * into a marker is held back until the next token decides it. The held-back text
 * is always shorter than the longest marker.
 *
 *   outside ──(marker prefix at end)──▶ entering-thought ──(`<tag>`)──▶ in-thought
 *      ▲                                      │                          │
 *      └──────────(no marker)─────────────────┘◀───────(`</tag>`)─────────┘
 */

import { STREAM_THOUGHT_TAGS } from '../constants.js';
import type { SegmentKind } from '../types.js';

export type StreamState = 'outside' | 'entering-thought' | 'in-thought';

export interface ClassifiedToken {
  text: string;
  kind: Extract<SegmentKind, 'thought' | 'text'>;
}

const OPENING_MARKERS = STREAM_THOUGHT_TAGS.map(tag => `<${tag}>`);
const OPENING_PATTERN = new RegExp(`<(${STREAM_THOUGHT_TAGS.join('|')})>`, 'i');

export class StreamingResponseParser {
  private buffer = '';
  private pending = '';
  private state: StreamState = 'outside';
  private closingMarker: string | null = null;

  getState(): StreamState {
    return this.state;
  }

  getBuffer(): string {
    return this.buffer;
  }

  /**
   * Classify one streamed token.
   * Returns the pieces that can be shown now; markers themselves are never returned.
   */
  push(token: string): ClassifiedToken[] {
    this.buffer += token;
    const pieces: ClassifiedToken[] = [];
    let rest = this.pending + token;
    this.pending = '';

    while (rest) {
      if (this.closingMarker) {
        const index = indexOfIgnoreCase(rest, this.closingMarker);
        if (index >= 0) {
          emit(pieces, 'thought', rest.slice(0, index));
          rest = rest.slice(index + this.closingMarker.length);
          this.closingMarker = null;
          this.state = 'outside';
          continue;
        }
        const held = partialMarkerLength(rest, [this.closingMarker]);
        emit(pieces, 'thought', rest.slice(0, rest.length - held));
        this.pending = rest.slice(rest.length - held);
        break;
      }

      const opening = OPENING_PATTERN.exec(rest);
      if (opening) {
        emit(pieces, 'text', rest.slice(0, opening.index));
        rest = rest.slice(opening.index + opening[0].length);
        this.closingMarker = `</${(opening[1] ?? '').toLowerCase()}>`;
        this.state = 'in-thought';
        continue;
      }

      const held = partialMarkerLength(rest, OPENING_MARKERS);
      emit(pieces, 'text', rest.slice(0, rest.length - held));
      this.pending = rest.slice(rest.length - held);
      this.state = held > 0 ? 'entering-thought' : 'outside';
      break;
    }

    return pieces;
  }

  /**
   * Release whatever is still held back once the stream has ended.
   * A marker prefix that never completed is plain text.
   */
  flush(): ClassifiedToken[] {
    const pieces: ClassifiedToken[] = [];
    emit(pieces, this.closingMarker ? 'thought' : 'text', this.pending);
    this.pending = '';
    if (this.state === 'entering-thought') {
      this.state = 'outside';
    }
    return pieces;
  }
}

function emit(pieces: ClassifiedToken[], kind: ClassifiedToken['kind'], text: string): void {
  if (text) {
    pieces.push({ text, kind });
  }
}

function indexOfIgnoreCase(text: string, marker: string): number {
  for (let i = 0; i + marker.length <= text.length; i++) {
    if (text.slice(i, i + marker.length).toLowerCase() === marker) {
      return i;
    }
  }
  return -1;
}

/**
 * Length of the longest proper marker prefix that ends the text.
 */
function partialMarkerLength(text: string, markers: readonly string[]): number {
  let longest = 0;
  for (const marker of markers) {
    for (let length = Math.min(marker.length - 1, text.length); length > longest; length--) {
      if (text.slice(-length).toLowerCase() === marker.slice(0, length)) {
        longest = length;
        break;
      }
    }
  }
  return longest;
}
