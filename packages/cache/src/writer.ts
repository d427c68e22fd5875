/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * BinaryDumpWriter - writes .objbin binary dumps
 */

import { createLogger, type Scene } from '@objkit/data';
import { MAGIC, type BinaryDumpOptions } from './types.js';
import { BufferWriter } from './utils/buffer-utils.js';
import { writeCameras, writeEnvironments } from './sections/cameras.js';
import { writeMaterials } from './sections/materials.js';
import { writeShapes } from './sections/shapes.js';

const log = createLogger('BinaryDump');

export class BinaryDumpWriter {
  /**
   * Write a complete dump
   * @returns the encoded bytes
   */
  write(scene: Scene, options: BinaryDumpOptions = {}): Uint8Array {
    const { extensions = false } = options;
    const writer = new BufferWriter();

    writer.writeUint32(MAGIC);
    writeCameras(writer, extensions ? scene.cameras : []);
    writeEnvironments(writer, extensions ? scene.environments : []);
    writeMaterials(writer, scene.materials);
    writeShapes(writer, scene.shapes, extensions);

    const bytes = writer.build();
    log.info('wrote binary dump', { data: { bytes: bytes.length, shapes: scene.shapes.length } });
    return bytes;
  }
}
