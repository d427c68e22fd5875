/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Numeric field parsing shared by the OBJ and MTL scanners
 */

import { FormatError, vec3, type Vec3 } from '@objkit/data';

/** Where the record being parsed came from, for error messages */
export interface RecordContext {
  source?: string;
  lineNumber?: number;
}

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const NON_FINITE = /^([+-]?)(inf|infinity|nan)$/i;

export function formatError(message: string, ctx: RecordContext): FormatError {
  return new FormatError(message, ctx.source, ctx.lineNumber);
}

/**
 * Throws unless `tokens` has at least `count` entries after the keyword.
 */
export function requireValues(tokens: readonly string[], count: number, ctx: RecordContext): void {
  if (tokens.length - 1 < count) {
    throw formatError(
      `'${tokens[0]}' expects at least ${count} value${count === 1 ? '' : 's'}, got ${tokens.length - 1}`,
      ctx
    );
  }
}

/**
 * Decimal float literals, plus `inf`, `infinity` and `nan` in any case.
 * Hex, binary and digit-separator forms are rejected.
 */
export function parseNumber(token: string, ctx: RecordContext): number {
  if (DECIMAL.test(token)) {
    return Number(token);
  }
  const special = NON_FINITE.exec(token);
  if (special) {
    if (special[2].toLowerCase() === 'nan') return Number.NaN;
    return special[1] === '-' ? -Infinity : Infinity;
  }
  throw formatError(`invalid number '${token}'`, ctx);
}

export function parseInteger(token: string, ctx: RecordContext): number {
  if (!INTEGER.test(token)) {
    throw formatError(`invalid integer '${token}'`, ctx);
  }
  return Number.parseInt(token, 10);
}

/** Scene data is single precision; values are rounded as they are read */
export function parseFloat32(token: string, ctx: RecordContext): number {
  return Math.fround(parseNumber(token, ctx));
}

/** Reads three float32 values starting at tokens[offset] */
export function parseVec3(tokens: readonly string[], offset: number, ctx: RecordContext): Vec3 {
  return vec3(
    parseFloat32(tokens[offset], ctx),
    parseFloat32(tokens[offset + 1], ctx),
    parseFloat32(tokens[offset + 2], ctx)
  );
}

/** Everything after the keyword joined back with single spaces */
export function joinRest(tokens: readonly string[]): string {
  return tokens.slice(1).join(' ');
}
