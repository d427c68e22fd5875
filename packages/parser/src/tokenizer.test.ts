/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { FormatError } from '@objkit/data';
import { isSkippable, scanLines, tokenizeLine } from './tokenizer.js';

describe('tokenizeLine', () => {
  it('splits on whitespace runs and drops leading/trailing blanks', () => {
    expect(tokenizeLine('  f 1/2/3\t 4//5   6 ')).toEqual(['f', '1/2/3', '4//5', '6']);
  });

  it('returns no tokens for a blank line', () => {
    expect(tokenizeLine(' \t \r')).toEqual([]);
  });

  it('accepts exactly maxTokens tokens', () => {
    expect(tokenizeLine('a b c', 3)).toEqual(['a', 'b', 'c']);
  });

  it('rejects records over the token limit instead of truncating', () => {
    expect(() => tokenizeLine('a b c d', 3, 'scene.obj', 7)).toThrow(FormatError);
    expect(() => tokenizeLine('a b c d', 3, 'scene.obj', 7)).toThrow(
      'scene.obj:7: record has more than 3 tokens'
    );
  });
});

describe('scanLines', () => {
  it('numbers lines and strips LF and CRLF terminators', () => {
    const lines = [...scanLines('v 1 2 3\r\n\nf 1 2 3\n')];
    expect(lines).toEqual([
      { text: 'v 1 2 3', lineNumber: 1 },
      { text: '', lineNumber: 2 },
      { text: 'f 1 2 3', lineNumber: 3 },
    ]);
  });

  it('yields a final line without terminator', () => {
    expect([...scanLines('o a\ng b')]).toEqual([
      { text: 'o a', lineNumber: 1 },
      { text: 'g b', lineNumber: 2 },
    ]);
  });
});

describe('isSkippable', () => {
  it('skips empty records and comments', () => {
    expect(isSkippable([])).toBe(true);
    expect(isSkippable(['#', 'comment'])).toBe(true);
    expect(isSkippable(['#comment'])).toBe(true);
    expect(isSkippable(['v', '0', '0', '0'])).toBe(false);
  });
});
