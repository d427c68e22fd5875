/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Vec3 and vector field serialization
 */

import { vec3, type Vec3 } from '@objkit/data';
import { BufferWriter, BufferReader } from '../utils/buffer-utils.js';

export function writeVec3(writer: BufferWriter, v: Vec3): void {
  writer.writeFloat32(v.x);
  writer.writeFloat32(v.y);
  writer.writeFloat32(v.z);
}

export function readVec3(reader: BufferReader, what: string): Vec3 {
  return vec3(reader.readFloat32(what), reader.readFloat32(what), reader.readFloat32(what));
}

/**
 * Format:
 *   - count: uint32 (scalars, not tuples)
 *   - values: float32[count]
 */
export function writeFloat32Vector(writer: BufferWriter, values: Float32Array): void {
  writer.writeUint32(values.length);
  writer.writeTypedArray(values);
}

export function readFloat32Vector(reader: BufferReader, what: string): Float32Array {
  const count = reader.readUint32(what);
  return reader.readFloat32Array(count, what);
}

export function writeInt32Vector(writer: BufferWriter, values: Int32Array): void {
  writer.writeUint32(values.length);
  writer.writeTypedArray(values);
}

export function readInt32Vector(reader: BufferReader, what: string): Int32Array {
  const count = reader.readUint32(what);
  return reader.readInt32Array(count, what);
}
