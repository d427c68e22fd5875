/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Line tokenizer for OBJ and MTL text - char-code scanning, no regex
 */

import { FormatError } from '@objkit/data';

/** Default cap on tokens per record */
export const DEFAULT_MAX_TOKENS = 1024;

const SPACE = 0x20;
const TAB = 0x09;
const CR = 0x0D;
const LF = 0x0A;
const VT = 0x0B;
const FF = 0x0C;
const HASH = 0x23;

function isWhitespace(c: number): boolean {
  return c === SPACE || c === TAB || c === CR || c === LF || c === VT || c === FF;
}

export interface SourceLine {
  text: string;
  /** 1-based */
  lineNumber: number;
}

/**
 * Yields every line of `text`, LF or CRLF terminated, without the terminator.
 */
export function* scanLines(text: string): Generator<SourceLine> {
  const len = text.length;
  let start = 0;
  let lineNumber = 1;

  for (let pos = 0; pos < len; pos++) {
    if (text.charCodeAt(pos) === LF) {
      const end = pos > start && text.charCodeAt(pos - 1) === CR ? pos - 1 : pos;
      yield { text: text.slice(start, end), lineNumber };
      start = pos + 1;
      lineNumber++;
    }
  }

  if (start < len) {
    const end = text.charCodeAt(len - 1) === CR ? len - 1 : len;
    yield { text: text.slice(start, end), lineNumber };
  }
}

/**
 * Split a line on whitespace runs.
 * Throws when the line holds more than `maxTokens` tokens instead of
 * truncating the record.
 */
export function tokenizeLine(
  line: string,
  maxTokens: number = DEFAULT_MAX_TOKENS,
  source?: string,
  lineNumber?: number
): string[] {
  const tokens: string[] = [];
  const len = line.length;
  let pos = 0;

  while (pos < len) {
    while (pos < len && isWhitespace(line.charCodeAt(pos))) pos++;
    if (pos >= len) break;

    const start = pos;
    while (pos < len && !isWhitespace(line.charCodeAt(pos))) pos++;

    if (tokens.length === maxTokens) {
      throw new FormatError(`record has more than ${maxTokens} tokens`, source, lineNumber);
    }
    tokens.push(line.slice(start, pos));
  }

  return tokens;
}

/** True for records the callers skip: no tokens, or a leading '#' */
export function isSkippable(tokens: readonly string[]): boolean {
  return tokens.length === 0 || tokens[0].charCodeAt(0) === HASH;
}
