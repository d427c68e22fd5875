/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Attribute pools - raw vertex attributes in file order
 *
 * Face, line and point records reference entries here by their position in
 * the file. Values are stored at float32 precision, which is what shapes
 * end up holding.
 */

import { vec3, type Vec2, type Vec3 } from '@objkit/data';

/** The five attribute kinds, in vertex-reference order */
export enum Attribute {
  Position = 0,
  Texcoord = 1,
  Normal = 2,
  Color = 3,
  Radius = 4,
}

export const ATTRIBUTE_COUNT = 5;

/** Floats per entry for each attribute */
export const ATTRIBUTE_WIDTH: Readonly<Record<Attribute, number>> = {
  [Attribute.Position]: 3,
  [Attribute.Texcoord]: 2,
  [Attribute.Normal]: 3,
  [Attribute.Color]: 3,
  [Attribute.Radius]: 1,
};

export class AttributePools {
  private readonly pools: number[][] = [[], [], [], [], []];

  addPosition(v: Vec3): void {
    this.pools[Attribute.Position].push(Math.fround(v.x), Math.fround(v.y), Math.fround(v.z));
  }

  addTexcoord(v: Vec2): void {
    this.pools[Attribute.Texcoord].push(Math.fround(v.x), Math.fround(v.y));
  }

  addNormal(v: Vec3): void {
    this.pools[Attribute.Normal].push(Math.fround(v.x), Math.fround(v.y), Math.fround(v.z));
  }

  addColor(v: Vec3): void {
    this.pools[Attribute.Color].push(Math.fround(v.x), Math.fround(v.y), Math.fround(v.z));
  }

  addRadius(r: number): void {
    this.pools[Attribute.Radius].push(Math.fround(r));
  }

  /** Number of entries (not floats) in a pool */
  count(attribute: Attribute): number {
    return this.pools[attribute].length / ATTRIBUTE_WIDTH[attribute];
  }

  /** Appends entry `index` of `attribute` to `out` */
  copyTo(attribute: Attribute, index: number, out: number[]): void {
    const width = ATTRIBUTE_WIDTH[attribute];
    const pool = this.pools[attribute];
    const base = index * width;
    for (let i = 0; i < width; i++) {
      out.push(pool[base + i]);
    }
  }

  readVec3(attribute: Attribute.Position | Attribute.Normal | Attribute.Color, index: number): Vec3 {
    const pool = this.pools[attribute];
    return vec3(pool[index * 3], pool[index * 3 + 1], pool[index * 3 + 2]);
  }

  readVec2(attribute: Attribute.Texcoord, index: number): Vec2 {
    const pool = this.pools[attribute];
    return { x: pool[index * 2], y: pool[index * 2 + 1] };
  }
}
