/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Filesystem entry points for binary dumps
 */

import * as fs from 'fs';
import { IoError, type Scene } from '@objkit/data';
import type { BinaryDumpOptions } from './types.js';
import { BinaryDumpReader } from './reader.js';
import { BinaryDumpWriter } from './writer.js';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function saveObjbin(filePath: string, scene: Scene, options: BinaryDumpOptions = {}): void {
  const bytes = new BinaryDumpWriter().write(scene, options);
  try {
    fs.writeFileSync(filePath, bytes);
  } catch (error) {
    throw new IoError(`Cannot write ${filePath}: ${describe(error)}`, filePath, error);
  }
}

export function loadObjbin(filePath: string, options: BinaryDumpOptions = {}): Scene {
  let bytes: Uint8Array;
  try {
    bytes = fs.readFileSync(filePath);
  } catch (error) {
    throw new IoError(`Cannot read ${filePath}: ${describe(error)}`, filePath, error);
  }
  return new BinaryDumpReader().read(bytes, options);
}
