/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Vertex references and the per-shape vertex table
 *
 * OBJ faces name a vertex as a tuple of pool indices (p/t/n, plus color and
 * radius as extensions). Shapes are indexed meshes, so each distinct tuple
 * becomes one local vertex; the table maps tuples to local ids in order of
 * first appearance. Only exact tuple equality merges vertices.
 */

import { Attribute, ATTRIBUTE_COUNT, type AttributePools } from './attribute-pools.js';
import { formatError, parseInteger, type RecordContext } from './values.js';

/** Marks an attribute the reference does not use */
export const ABSENT = -1;

/** Resolved 0-based pool indices, ABSENT where unused */
export type AttributeReference = readonly [
  position: number,
  texcoord: number,
  normal: number,
  color: number,
  radius: number,
];

export interface ResolvedVertex {
  reference: AttributeReference;
  /** Local vertex id within the current shape */
  localId: number;
  /** True the first time the reference is seen in this scope */
  isNew: boolean;
}

const SLASH = 0x2F;

/**
 * Parse one `p[/t[/n[/c[/r]]]]` vertex token.
 *
 * Negative indices count back from the pool length before the current
 * record. Color and radius components are ignored unless extensions are
 * enabled.
 */
export function parseVertexReference(
  token: string,
  pools: AttributePools,
  extensions: boolean,
  ctx: RecordContext
): AttributeReference {
  const parts: string[] = [];
  let start = 0;
  for (let pos = 0; pos <= token.length; pos++) {
    if (pos === token.length || token.charCodeAt(pos) === SLASH) {
      parts.push(token.slice(start, pos));
      start = pos + 1;
    }
  }
  if (parts.length > ATTRIBUTE_COUNT) {
    throw formatError(`vertex reference '${token}' has more than ${ATTRIBUTE_COUNT} components`, ctx);
  }

  const usable = extensions ? ATTRIBUTE_COUNT : Attribute.Color;
  const resolved = [ABSENT, ABSENT, ABSENT, ABSENT, ABSENT];
  for (let attribute = 0; attribute < usable && attribute < parts.length; attribute++) {
    const part = parts[attribute];
    if (part === '') continue;
    resolved[attribute] = resolveIndex(parseInteger(part, ctx), pools.count(attribute), token, ctx);
  }

  if (resolved[Attribute.Position] === ABSENT) {
    throw formatError(`vertex reference '${token}' has no position index`, ctx);
  }

  return [resolved[0], resolved[1], resolved[2], resolved[3], resolved[4]];
}

function resolveIndex(value: number, poolLength: number, token: string, ctx: RecordContext): number {
  if (value === 0) {
    throw formatError(`vertex reference '${token}' uses index 0`, ctx);
  }
  const index = value < 0 ? poolLength + value : value - 1;
  if (index < 0 || index >= poolLength) {
    throw formatError(`vertex reference '${token}' is out of range (${poolLength} defined)`, ctx);
  }
  return index;
}

interface VertexEntry {
  reference: AttributeReference;
  localId: number;
}

function hashReference(ref: AttributeReference): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < ATTRIBUTE_COUNT; i++) {
    h = Math.imul(h ^ (ref[i] + 1), 0x01000193);
  }
  return h >>> 0;
}

function sameReference(a: AttributeReference, b: AttributeReference): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2] && a[3] === b[3] && a[4] === b[4];
}

/**
 * Bucketed hash table from attribute reference to local vertex id.
 * Scoped to one shape: the assembler clears it on every flush.
 */
export class VertexTable {
  private buckets: Map<number, VertexEntry[]> = new Map();
  private count = 0;

  /** Number of local vertices in the current scope */
  get size(): number {
    return this.count;
  }

  resolve(reference: AttributeReference): ResolvedVertex {
    const hash = hashReference(reference);
    let bucket = this.buckets.get(hash);
    if (bucket) {
      for (const entry of bucket) {
        if (sameReference(entry.reference, reference)) {
          return { reference: entry.reference, localId: entry.localId, isNew: false };
        }
      }
    } else {
      bucket = [];
      this.buckets.set(hash, bucket);
    }

    const localId = this.count++;
    bucket.push({ reference, localId });
    return { reference, localId, isNew: true };
  }

  clear(): void {
    this.buckets = new Map();
    this.count = 0;
  }
}
