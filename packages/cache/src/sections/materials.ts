/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Material serialization
 */

import { TEXTURE_CHANNELS, createMaterial, type Material } from '@objkit/data';
import { BufferWriter, BufferReader } from '../utils/buffer-utils.js';
import { readVec3, writeVec3 } from './vectors.js';

/**
 * Format per material:
 *   - name: string
 *   - illum: int32
 *   - ke, ka, kd, ks, kr, kt: Vec3
 *   - ns, ior, op: float32
 *   - texture paths: string[11], TEXTURE_CHANNELS order
 */
export function writeMaterials(writer: BufferWriter, materials: readonly Material[]): void {
  writer.writeUint32(materials.length);
  for (const material of materials) {
    writer.writeString(material.name);
    writer.writeInt32(material.illum);
    writeVec3(writer, material.ke);
    writeVec3(writer, material.ka);
    writeVec3(writer, material.kd);
    writeVec3(writer, material.ks);
    writeVec3(writer, material.kr);
    writeVec3(writer, material.kt);
    writer.writeFloat32(material.ns);
    writer.writeFloat32(material.ior);
    writer.writeFloat32(material.op);
    for (const channel of TEXTURE_CHANNELS) {
      writer.writeString(material.textures[channel].path);
    }
  }
}

/** Texture indices are left at -1; the reader rebuilds the texture list */
export function readMaterials(reader: BufferReader): Material[] {
  const count = reader.readUint32('material count');
  const materials: Material[] = [];
  for (let i = 0; i < count; i++) {
    const material = createMaterial(reader.readString('material name'));
    material.illum = reader.readInt32('material illum');
    material.ke = readVec3(reader, 'material ke');
    material.ka = readVec3(reader, 'material ka');
    material.kd = readVec3(reader, 'material kd');
    material.ks = readVec3(reader, 'material ks');
    material.kr = readVec3(reader, 'material kr');
    material.kt = readVec3(reader, 'material kt');
    material.ns = reader.readFloat32('material ns');
    material.ior = reader.readFloat32('material ior');
    material.op = reader.readFloat32('material op');
    for (const channel of TEXTURE_CHANNELS) {
      material.textures[channel].path = reader.readString(`material ${channel} texture`);
    }
    materials.push(material);
  }
  return materials;
}
