/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * OBJ writer
 *
 * Shapes are written one after another. Each shape's vertices are emitted
 * in local-id order, so a local id maps back to a file index by adding the
 * number of entries of that attribute written before the shape. The
 * offsets run across the whole file, cameras and environments included.
 */

import {
  ElementType,
  createLogger,
  elementStride,
  isVariableElementType,
  type Camera,
  type Environment,
  type Scene,
  type Shape,
} from '@objkit/data';
import { formatFloats, formatVec2, formatVec3, record } from './format.js';
import { serializeMtl } from './mtl-writer.js';

const log = createLogger('Writer');

export interface ObjWriteOptions {
  /** Write cameras, environments, vc/vr vertex data and xf transforms (default: false) */
  extensions?: boolean;
  /** Name written in the `mtllib` record when the scene has materials */
  materialLibrary?: string;
}

export interface SerializedObj {
  obj: string;
  /** MTL text, null when the scene has no materials */
  mtl: string | null;
}

/** Entries written so far per attribute */
interface Offsets {
  position: number;
  texcoord: number;
  normal: number;
  color: number;
  radius: number;
}

/** Element record keyword per element type */
function elementKeyword(type: ElementType): string {
  switch (type) {
    case ElementType.Point:
      return 'p';
    case ElementType.Line:
    case ElementType.Polyline:
      return 'l';
    case ElementType.Triangle:
    case ElementType.Polygon:
      return 'f';
  }
}

/**
 * Serialize a scene as OBJ text plus the MTL text of its materials.
 */
export function serializeObj(scene: Scene, options: ObjWriteOptions = {}): SerializedObj {
  const { extensions = false, materialLibrary } = options;
  const lines: string[] = [];
  const offsets: Offsets = { position: 0, texcoord: 0, normal: 0, color: 0, radius: 0 };

  const hasMaterials = scene.materials.length > 0;
  if (hasMaterials && materialLibrary) {
    lines.push(`mtllib ${materialLibrary}`);
  }

  if (extensions) {
    for (const camera of scene.cameras) {
      writeCamera(lines, camera, offsets);
    }
    for (const environment of scene.environments) {
      writeEnvironment(lines, environment, offsets);
    }
  }

  for (const shape of scene.shapes) {
    writeShape(lines, shape, offsets, extensions);
  }

  log.info('serialized scene', {
    data: { shapes: scene.shapes.length, materials: scene.materials.length, lines: lines.length },
  });

  return {
    obj: lines.length > 0 ? `${lines.join('\n')}\n` : '',
    mtl: hasMaterials ? serializeMtl(scene.materials) : null,
  };
}

/**
 * Two look-at vertices: `from` carries the up vector and aperture, `to`
 * carries the film size.
 */
function writeCamera(lines: string[], camera: Camera, offsets: Offsets): void {
  lines.push(record('o', camera.name));
  lines.push(`v ${formatVec3(camera.from)}`);
  lines.push(`v ${formatVec3(camera.to)}`);
  lines.push(`vn ${formatVec3(camera.up)}`);
  lines.push(`vn ${formatVec3(camera.up)}`);
  lines.push(`vt ${formatVec2({ x: camera.aperture, y: camera.aperture })}`);
  lines.push(`vt ${formatVec2({ x: camera.width, y: camera.height })}`);
  lines.push(`c ${lookAtReferences(offsets)}`);
}

function writeEnvironment(lines: string[], environment: Environment, offsets: Offsets): void {
  lines.push(record('o', environment.name));
  if (environment.materialName) {
    lines.push(`usemtl ${environment.materialName}`);
  }
  lines.push(`v ${formatVec3(environment.from)}`);
  lines.push(`v ${formatVec3(environment.to)}`);
  lines.push(`vn ${formatVec3(environment.up)}`);
  lines.push(`vn ${formatVec3(environment.up)}`);
  lines.push('vt 0 0');
  lines.push('vt 0 0');
  lines.push(`e ${lookAtReferences(offsets)}`);
}

/** References to the two p/t/n vertices just written; advances the offsets */
function lookAtReferences(offsets: Offsets): string {
  const refs = [1, 2]
    .map((k) => `${offsets.position + k}/${offsets.texcoord + k}/${offsets.normal + k}`)
    .join(' ');
  offsets.position += 2;
  offsets.texcoord += 2;
  offsets.normal += 2;
  return refs;
}

function writeShape(lines: string[], shape: Shape, offsets: Offsets, extensions: boolean): void {
  lines.push(record('o', shape.name));
  if (shape.groupName) {
    lines.push(`g ${shape.groupName}`);
  }
  if (shape.materialName) {
    lines.push(`usemtl ${shape.materialName}`);
  }
  if (extensions && shape.transformed) {
    lines.push(`xf ${formatFloats(shape.transform, 0, 12)}`);
  }

  const count = shape.vertexCount;
  const hasTexcoords = shape.texcoords.length > 0;
  const hasNormals = shape.normals.length > 0;
  const hasColors = extensions && shape.colors.length > 0;
  const hasRadius = extensions && shape.radius.length > 0;

  for (let i = 0; i < count; i++) {
    lines.push(`v ${formatFloats(shape.positions, i * 3, 3)}`);
    if (hasNormals) lines.push(`vn ${formatFloats(shape.normals, i * 3, 3)}`);
    if (hasTexcoords) lines.push(`vt ${formatFloats(shape.texcoords, i * 2, 2)}`);
    if (hasColors) lines.push(`vc ${formatFloats(shape.colors, i * 3, 3)}`);
    if (hasRadius) lines.push(`vr ${formatFloats(shape.radius, i, 1)}`);
  }

  const reference = (id: number): string => {
    // p/t/n/c/r with empty slots for absent attributes, trailing ones dropped
    const parts = [
      String(offsets.position + id + 1),
      hasTexcoords ? String(offsets.texcoord + id + 1) : '',
      hasNormals ? String(offsets.normal + id + 1) : '',
      hasColors ? String(offsets.color + id + 1) : '',
      hasRadius ? String(offsets.radius + id + 1) : '',
    ];
    while (parts[parts.length - 1] === '') parts.pop();
    return parts.join('/');
  };

  const keyword = elementKeyword(shape.elementType);
  const elements = shape.elements;
  if (isVariableElementType(shape.elementType)) {
    let pos = 0;
    for (let e = 0; e < shape.elementCount; e++) {
      const length = elements[pos];
      const refs: string[] = [];
      for (let i = 1; i <= length; i++) refs.push(reference(elements[pos + i]));
      lines.push(`${keyword} ${refs.join(' ')}`);
      pos += length + 1;
    }
  } else {
    const stride = elementStride(shape.elementType);
    for (let e = 0; e < shape.elementCount; e++) {
      const refs: string[] = [];
      for (let i = 0; i < stride; i++) refs.push(reference(elements[e * stride + i]));
      lines.push(`${keyword} ${refs.join(' ')}`);
    }
  }

  offsets.position += count;
  if (hasTexcoords) offsets.texcoord += count;
  if (hasNormals) offsets.normal += count;
  if (hasColors) offsets.color += count;
  if (hasRadius) offsets.radius += count;
}
