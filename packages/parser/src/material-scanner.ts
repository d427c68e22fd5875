/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * MTL scanner - flat `key value...` lines applied to the current material
 */

import {
  addUniqueTexture,
  createLogger,
  createMaterial,
  type Material,
  type Scene,
  type TextureChannel,
} from '@objkit/data';
import { DEFAULT_MAX_TOKENS, isSkippable, scanLines, tokenizeLine } from './tokenizer.js';
import {
  formatError,
  joinRest,
  parseInteger,
  parseFloat32,
  parseVec3,
  requireValues,
  type RecordContext,
} from './values.js';

const log = createLogger('MaterialScanner');

type ColorChannel = 'ke' | 'ka' | 'kd' | 'ks' | 'kr' | 'kt';

const COLOR_KEYS = new Map<string, ColorChannel>([
  ['Ke', 'ke'],
  ['Ka', 'ka'],
  ['Kd', 'kd'],
  ['Ks', 'ks'],
  ['Kr', 'kr'],
  ['Kt', 'kt'],
  ['Tf', 'kt'],
]);

const TEXTURE_KEYS = new Map<string, TextureChannel>([
  ['map_Ke', 'ke'],
  ['map_Ka', 'ka'],
  ['map_Kd', 'kd'],
  ['map_Ks', 'ks'],
  ['map_Kr', 'kr'],
  ['map_Kt', 'kt'],
  ['map_Tf', 'kt'],
  ['map_Ns', 'ns'],
  ['map_d', 'op'],
  ['map_Tr', 'op'],
  ['map_Ni', 'ior'],
  ['map_bump', 'bump'],
  ['map_Bump', 'bump'],
  ['bump', 'bump'],
  ['map_disp', 'disp'],
  ['disp', 'disp'],
]);

export interface MaterialScanOptions {
  /** File name used in error messages */
  source?: string;
  maxTokens?: number;
}

/**
 * Scan MTL text, appending materials and newly referenced textures to
 * `scene`. Returns the number of materials added.
 */
export function scanMaterialLibrary(text: string, scene: Scene, options: MaterialScanOptions = {}): number {
  const { source, maxTokens = DEFAULT_MAX_TOKENS } = options;
  const ignored = new Set<string>();
  const firstMaterial = scene.materials.length;
  let material: Material | null = null;

  for (const { text: line, lineNumber } of scanLines(text)) {
    const tokens = tokenizeLine(line, maxTokens, source, lineNumber);
    if (isSkippable(tokens)) continue;

    const ctx: RecordContext = { source, lineNumber };
    const key = tokens[0];

    if (key === 'newmtl') {
      material = createMaterial(joinRest(tokens));
      scene.materials.push(material);
      continue;
    }

    const colorChannel = COLOR_KEYS.get(key);
    const textureChannel = TEXTURE_KEYS.get(key);
    const known =
      colorChannel !== undefined ||
      textureChannel !== undefined ||
      key === 'illum' ||
      key === 'Ns' ||
      key === 'd' ||
      key === 'Tr' ||
      key === 'Ni';

    if (!known) {
      if (!ignored.has(key)) {
        ignored.add(key);
        log.debug(`ignoring key '${key}'`, undefined, ctx);
      }
      continue;
    }

    if (material === null) {
      throw formatError(`'${key}' appears before any newmtl`, ctx);
    }

    if (colorChannel !== undefined) {
      requireValues(tokens, 3, ctx);
      material[colorChannel] = parseVec3(tokens, 1, ctx);
    } else if (textureChannel !== undefined) {
      requireValues(tokens, 1, ctx);
      // Map options (-bm 0.5, -clamp on, ...) come first; the path is last
      const path = tokens[tokens.length - 1];
      material.textures[textureChannel] = { path, index: addUniqueTexture(scene.textures, path) };
    } else {
      requireValues(tokens, 1, ctx);
      applyScalar(material, key, tokens[1], ctx);
    }
  }

  const added = scene.materials.length - firstMaterial;
  log.info(`scanned ${added} material(s)`, { source });
  return added;
}

function applyScalar(material: Material, key: string, token: string, ctx: RecordContext): void {
  switch (key) {
    case 'illum':
      material.illum = parseInteger(token, ctx);
      break;
    case 'Ns':
      material.ns = parseFloat32(token, ctx);
      break;
    case 'd':
      material.op = parseFloat32(token, ctx);
      break;
    case 'Tr':
      // Transparency, the complement of dissolve
      material.op = Math.fround(1 - parseFloat32(token, ctx));
      break;
    case 'Ni':
      material.ior = parseFloat32(token, ctx);
      break;
  }
}
