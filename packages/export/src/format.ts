/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Number and record formatting shared by the OBJ and MTL writers
 */

import type { Vec2, Vec3 } from '@objkit/data';

/** Six significant digits, trailing zeros dropped */
export function formatFloat(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  // Number() normalizes -0 and strips the zeros toPrecision pads with
  return String(Number(value.toPrecision(6)));
}

export function formatVec2(v: Vec2): string {
  return `${formatFloat(v.x)} ${formatFloat(v.y)}`;
}

export function formatVec3(v: Vec3): string {
  return `${formatFloat(v.x)} ${formatFloat(v.y)} ${formatFloat(v.z)}`;
}

/** Formats `count` floats of `data` starting at `offset` */
export function formatFloats(data: ArrayLike<number>, offset: number, count: number): string {
  const parts: string[] = [];
  for (let i = 0; i < count; i++) {
    parts.push(formatFloat(data[offset + i]));
  }
  return parts.join(' ');
}

/** `keyword value`, or the bare keyword when the value is empty */
export function record(keyword: string, value: string): string {
  return value ? `${keyword} ${value}` : keyword;
}
