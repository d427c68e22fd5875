/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Shape serialization
 */

import {
  FormatError,
  elementStride,
  isElementType,
  isVariableElementType,
  type Shape,
} from '@objkit/data';
import { BufferWriter, BufferReader } from '../utils/buffer-utils.js';
import {
  readFloat32Vector,
  readInt32Vector,
  writeFloat32Vector,
  writeInt32Vector,
} from './vectors.js';

const EMPTY = new Float32Array(0);

/**
 * Write shapes. Colors and radius are only stored with extensions.
 */
export function writeShapes(writer: BufferWriter, shapes: readonly Shape[], extensions: boolean): void {
  writer.writeUint32(shapes.length);
  for (const shape of shapes) {
    writer.writeString(shape.name);
    writer.writeString(shape.groupName);
    writer.writeString(shape.materialName);
    writer.writeUint32(shape.elementCount);
    writeInt32Vector(writer, shape.elements);
    writer.writeUint32(shape.elementType);
    writer.writeUint32(shape.vertexCount);
    writeFloat32Vector(writer, shape.positions);
    writeFloat32Vector(writer, shape.normals);
    writeFloat32Vector(writer, shape.texcoords);
    writeFloat32Vector(writer, extensions ? shape.colors : EMPTY);
    writeFloat32Vector(writer, extensions ? shape.radius : EMPTY);
    writer.writeUint8(shape.transformed ? 1 : 0);
    writer.writeTypedArray(shape.transform);
  }
}

/**
 * Read shapes. Material indices are left at -1 for the caller to resolve.
 */
export function readShapes(reader: BufferReader, extensions: boolean): Shape[] {
  const count = reader.readUint32('shape count');
  const shapes: Shape[] = [];
  for (let i = 0; i < count; i++) {
    const name = reader.readString('shape name');
    const groupName = reader.readString('shape group name');
    const materialName = reader.readString('shape material name');
    const elementCount = reader.readUint32('shape element count');
    const elements = readInt32Vector(reader, 'shape elements');
    const elementType = reader.readUint32('shape element type');
    if (!isElementType(elementType)) {
      throw new FormatError(`shape ${i} has unknown element type ${elementType}`);
    }
    const vertexCount = reader.readUint32('shape vertex count');
    const positions = readFloat32Vector(reader, 'shape positions');
    const normals = readFloat32Vector(reader, 'shape normals');
    const texcoords = readFloat32Vector(reader, 'shape texcoords');
    const colors = readFloat32Vector(reader, 'shape colors');
    const radius = readFloat32Vector(reader, 'shape radius');
    const transformed = reader.readUint8('shape transformed flag') !== 0;
    const transform = reader.readFloat32Array(12, 'shape transform');

    const shape: Shape = {
      name,
      groupName,
      materialName,
      materialIndex: -1,
      elementType,
      elementCount,
      elements,
      vertexCount,
      positions,
      normals,
      texcoords,
      colors: extensions ? colors : new Float32Array(0),
      radius: extensions ? radius : new Float32Array(0),
      transformed,
      transform,
    };
    validateShape(shape, i);
    shapes.push(shape);
  }
  return shapes;
}

function validateShape(shape: Shape, index: number): void {
  const check = (values: Float32Array, width: number, what: string): void => {
    if (values.length !== 0 && values.length !== shape.vertexCount * width) {
      throw new FormatError(
        `shape ${index} has ${values.length} ${what} values for ${shape.vertexCount} vertices`
      );
    }
  };
  check(shape.positions, 3, 'position');
  check(shape.normals, 3, 'normal');
  check(shape.texcoords, 2, 'texcoord');
  check(shape.colors, 3, 'color');
  check(shape.radius, 1, 'radius');

  if (!isVariableElementType(shape.elementType)) {
    const expected = shape.elementCount * elementStride(shape.elementType);
    if (shape.elements.length !== expected) {
      throw new FormatError(
        `shape ${index} has ${shape.elements.length} element ids, expected ${expected}`
      );
    }
  }
}
