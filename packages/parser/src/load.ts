/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Filesystem entry point for OBJ loading
 */

import * as fs from 'fs';
import * as path from 'path';
import { IoError, type Scene } from '@objkit/data';
import { parseObj, type ObjParseOptions } from './obj-parser.js';

export type LoadObjOptions = Pick<ObjParseOptions, 'triangulate' | 'extensions' | 'maxTokens'>;

/**
 * Read a UTF-8 text file, mapping filesystem failures to IoError
 */
export function readTextFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new IoError(`Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`, filePath, error);
  }
}

/**
 * Load an OBJ file and the material libraries it references (resolved
 * against the OBJ file's directory).
 */
export function loadObj(filePath: string, options: LoadObjOptions = {}): Scene {
  const text = readTextFile(filePath);
  return parseObj(text, {
    ...options,
    baseDir: path.dirname(filePath),
    readTextFile,
    source: filePath,
  });
}
