/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * MTL writer
 */

import { TEXTURE_CHANNELS, type Material, type TextureChannel } from '@objkit/data';
import { formatFloat, formatVec3 } from './format.js';

/** Key each texture channel is written under */
const TEXTURE_KEYS: Readonly<Record<TextureChannel, string>> = {
  ke: 'map_Ke',
  ka: 'map_Ka',
  kd: 'map_Kd',
  ks: 'map_Ks',
  kr: 'map_Kr',
  kt: 'map_Kt',
  ns: 'map_Ns',
  op: 'map_d',
  ior: 'map_Ni',
  bump: 'map_bump',
  disp: 'map_disp',
};

export function serializeMaterial(material: Material): string[] {
  const lines = [
    `newmtl ${material.name}`,
    `illum ${material.illum}`,
    `Ke ${formatVec3(material.ke)}`,
    `Ka ${formatVec3(material.ka)}`,
    `Kd ${formatVec3(material.kd)}`,
    `Ks ${formatVec3(material.ks)}`,
    `Kr ${formatVec3(material.kr)}`,
    `Kt ${formatVec3(material.kt)}`,
    `Ns ${formatFloat(material.ns)}`,
    `d ${formatFloat(material.op)}`,
    `Ni ${formatFloat(material.ior)}`,
  ];
  for (const channel of TEXTURE_CHANNELS) {
    const path = material.textures[channel].path;
    if (path) {
      lines.push(`${TEXTURE_KEYS[channel]} ${path}`);
    }
  }
  return lines;
}

/**
 * Serialize materials as MTL text, one blank line between materials.
 */
export function serializeMtl(materials: readonly Material[]): string {
  const blocks = materials.map((material) => serializeMaterial(material).join('\n'));
  return blocks.length > 0 ? `${blocks.join('\n\n')}\n` : '';
}
