/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Filesystem entry point for OBJ saving
 */

import * as fs from 'fs';
import * as path from 'path';
import { IoError, createLogger, type Scene } from '@objkit/data';
import { serializeObj } from './obj-writer.js';

const log = createLogger('Writer');

export interface SaveObjOptions {
  /** Write cameras, environments, vertex colors/radius and transforms (default: false) */
  extensions?: boolean;
}

export function writeTextFile(filePath: string, text: string): void {
  try {
    fs.writeFileSync(filePath, text, 'utf8');
  } catch (error) {
    throw new IoError(`Cannot write ${filePath}: ${error instanceof Error ? error.message : String(error)}`, filePath, error);
  }
}

/**
 * Save a scene as OBJ. When the scene has materials they go to
 * `<basename>.mtl` in the same directory, referenced by `mtllib`.
 */
export function saveObj(filePath: string, scene: Scene, options: SaveObjOptions = {}): void {
  const materialLibrary = `${path.basename(filePath, path.extname(filePath))}.mtl`;
  const { obj, mtl } = serializeObj(scene, { extensions: options.extensions, materialLibrary });

  if (mtl !== null) {
    writeTextFile(path.join(path.dirname(filePath), materialLibrary), mtl);
  }
  writeTextFile(filePath, obj);

  log.info(`saved ${filePath}`, { data: { materialLibrary: mtl !== null ? materialLibrary : null } });
}
