/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * BinaryDumpReader - reads .objbin binary dumps
 */

import {
  MagicMismatchError,
  createLogger,
  findMaterialIndex,
  resolveMaterialTextures,
  sceneStats,
  type Scene,
} from '@objkit/data';
import { MAGIC, type BinaryDumpOptions } from './types.js';
import { BufferReader } from './utils/buffer-utils.js';
import { readCameras, readEnvironments } from './sections/cameras.js';
import { readMaterials } from './sections/materials.js';
import { readShapes } from './sections/shapes.js';

const log = createLogger('BinaryDump');

export class BinaryDumpReader {
  /**
   * Check the leading magic without decoding the rest
   */
  isDump(bytes: Uint8Array): boolean {
    if (bytes.length < 4) return false;
    return new BufferReader(bytes).readUint32('magic') === MAGIC;
  }

  /**
   * Read a complete dump.
   * Throws MagicMismatchError for foreign data and FormatError for a
   * truncated or inconsistent dump.
   */
  read(bytes: Uint8Array, options: BinaryDumpOptions = {}): Scene {
    const { extensions = false } = options;
    const reader = new BufferReader(bytes);

    const magic = reader.readUint32('magic');
    if (magic !== MAGIC) {
      throw new MagicMismatchError(MAGIC, magic);
    }

    const cameras = readCameras(reader);
    const environments = readEnvironments(reader);
    const materials = readMaterials(reader);
    const shapes = readShapes(reader, extensions);

    const scene: Scene = {
      shapes,
      materials,
      textures: [],
      cameras: extensions ? cameras : [],
      environments: extensions ? environments : [],
    };

    // Rebuild the texture list and every index from the names
    for (const material of scene.materials) {
      resolveMaterialTextures(material, scene.textures);
    }
    for (const shape of scene.shapes) {
      shape.materialIndex = findMaterialIndex(scene.materials, shape.materialName);
    }
    for (const environment of scene.environments) {
      environment.materialIndex = findMaterialIndex(scene.materials, environment.materialName);
    }

    if (reader.remaining > 0) {
      log.warn(`ignoring ${reader.remaining} trailing byte(s) after the dump`);
    }
    log.info('read binary dump', { data: { ...sceneStats(scene) } });
    return scene;
  }
}
