/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Camera and environment serialization
 */

import type { Camera, Environment } from '@objkit/data';
import { BufferWriter, BufferReader } from '../utils/buffer-utils.js';
import { readVec3, writeVec3 } from './vectors.js';

export function writeCameras(writer: BufferWriter, cameras: readonly Camera[]): void {
  writer.writeUint32(cameras.length);
  for (const camera of cameras) {
    writer.writeString(camera.name);
    writeVec3(writer, camera.from);
    writeVec3(writer, camera.to);
    writeVec3(writer, camera.up);
    writer.writeFloat32(camera.width);
    writer.writeFloat32(camera.height);
    writer.writeFloat32(camera.aperture);
  }
}

export function readCameras(reader: BufferReader): Camera[] {
  const count = reader.readUint32('camera count');
  const cameras: Camera[] = [];
  for (let i = 0; i < count; i++) {
    cameras.push({
      name: reader.readString('camera name'),
      from: readVec3(reader, 'camera from'),
      to: readVec3(reader, 'camera to'),
      up: readVec3(reader, 'camera up'),
      width: reader.readFloat32('camera width'),
      height: reader.readFloat32('camera height'),
      aperture: reader.readFloat32('camera aperture'),
    });
  }
  return cameras;
}

export function writeEnvironments(writer: BufferWriter, environments: readonly Environment[]): void {
  writer.writeUint32(environments.length);
  for (const environment of environments) {
    writer.writeString(environment.name);
    writer.writeString(environment.materialName);
    writeVec3(writer, environment.from);
    writeVec3(writer, environment.to);
    writeVec3(writer, environment.up);
  }
}

/** Material indices are left at -1; the reader resolves them once materials are known */
export function readEnvironments(reader: BufferReader): Environment[] {
  const count = reader.readUint32('environment count');
  const environments: Environment[] = [];
  for (let i = 0; i < count; i++) {
    environments.push({
      name: reader.readString('environment name'),
      materialName: reader.readString('environment material name'),
      materialIndex: -1,
      from: readVec3(reader, 'environment from'),
      to: readVec3(reader, 'environment to'),
      up: readVec3(reader, 'environment up'),
    });
  }
  return environments;
}
