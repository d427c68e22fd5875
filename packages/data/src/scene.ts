/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Scene construction and lookup helpers
 */

import {
  ElementType,
  TEXTURE_CHANNELS,
  type Affine3,
  type Camera,
  type Environment,
  type Material,
  type Scene,
  type TextureChannel,
  type TextureRef,
  type Texture,
  type Vec3,
} from './types.js';

export function createScene(): Scene {
  return {
    shapes: [],
    materials: [],
    textures: [],
    cameras: [],
    environments: [],
  };
}

export function vec3(x: number, y: number, z: number): Vec3 {
  return { x, y, z };
}

export function identityAffine3(): Affine3 {
  return new Float32Array([1, 0, 0, 0, 1, 0, 0, 0, 1, 0, 0, 0]);
}

export function isIdentityAffine3(m: Affine3): boolean {
  const identity = identityAffine3();
  for (let i = 0; i < 12; i++) {
    if (m[i] !== identity[i]) return false;
  }
  return true;
}

/** Vertex ids per element for fixed types, 0 for run-length encoded types */
export function elementStride(type: ElementType): number {
  switch (type) {
    case ElementType.Point:
      return 1;
    case ElementType.Line:
      return 2;
    case ElementType.Triangle:
      return 3;
    case ElementType.Polyline:
    case ElementType.Polygon:
      return 0;
  }
}

export function isVariableElementType(type: ElementType): boolean {
  return type === ElementType.Polyline || type === ElementType.Polygon;
}

export type ElementTypeName = 'point' | 'line' | 'triangle' | 'polyline' | 'polygon';

export function elementTypeName(type: ElementType): ElementTypeName {
  switch (type) {
    case ElementType.Point:
      return 'point';
    case ElementType.Line:
      return 'line';
    case ElementType.Triangle:
      return 'triangle';
    case ElementType.Polyline:
      return 'polyline';
    case ElementType.Polygon:
      return 'polygon';
  }
}

export function isElementType(value: number): value is ElementType {
  return (
    value === ElementType.Point ||
    value === ElementType.Line ||
    value === ElementType.Triangle ||
    value === ElementType.Polyline ||
    value === ElementType.Polygon
  );
}

function emptyTextureRef(): TextureRef {
  return { path: '', index: -1 };
}

export function createMaterial(name: string): Material {
  const textures: Record<TextureChannel, TextureRef> = {
    ke: emptyTextureRef(),
    ka: emptyTextureRef(),
    kd: emptyTextureRef(),
    ks: emptyTextureRef(),
    kr: emptyTextureRef(),
    kt: emptyTextureRef(),
    ns: emptyTextureRef(),
    op: emptyTextureRef(),
    ior: emptyTextureRef(),
    bump: emptyTextureRef(),
    disp: emptyTextureRef(),
  };
  return {
    name,
    illum: 0,
    ke: vec3(0, 0, 0),
    ka: vec3(0, 0, 0),
    kd: vec3(0, 0, 0),
    ks: vec3(0, 0, 0),
    kr: vec3(0, 0, 0),
    kt: vec3(0, 0, 0),
    ns: 1,
    ior: 1,
    op: 1,
    textures,
  };
}

export function createTexture(path: string): Texture {
  return { path, width: 0, height: 0, components: 0, pixels: null };
}

export function createCamera(name: string): Camera {
  return {
    name,
    from: vec3(0, 0, 0),
    to: vec3(0, 0, 1),
    up: vec3(0, 1, 0),
    width: 1,
    height: 1,
    aperture: 0,
  };
}

export function createEnvironment(name: string): Environment {
  return {
    name,
    materialName: '',
    materialIndex: -1,
    from: vec3(0, 0, 0),
    to: vec3(0, 0, 1),
    up: vec3(0, 1, 0),
  };
}

/**
 * Case-insensitive lookup; first match wins.
 * Names are kept as written, so two materials differing only by case both
 * survive a save but shapes always bind to the first.
 */
export function findMaterialIndex(materials: readonly Material[], name: string): number {
  if (!name) return -1;
  const wanted = name.toLowerCase();
  for (let i = 0; i < materials.length; i++) {
    if (materials[i].name.toLowerCase() === wanted) return i;
  }
  return -1;
}

/**
 * Index of the texture with this exact path, appending it if new.
 * Returns -1 for an empty path.
 */
export function addUniqueTexture(textures: Texture[], path: string): number {
  if (!path) return -1;
  const existing = textures.findIndex((t) => t.path === path);
  if (existing >= 0) return existing;
  textures.push(createTexture(path));
  return textures.length - 1;
}

/** Assign texture indices for every non-empty channel path */
export function resolveMaterialTextures(material: Material, textures: Texture[]): void {
  for (const channel of TEXTURE_CHANNELS) {
    const ref = material.textures[channel];
    ref.index = addUniqueTexture(textures, ref.path);
  }
}

export interface SceneStats {
  shapes: number;
  vertices: number;
  elements: Record<ElementTypeName, number>;
  materials: number;
  textures: number;
  loadedTextures: number;
  cameras: number;
  environments: number;
}

export function sceneStats(scene: Scene): SceneStats {
  const elements: Record<ElementTypeName, number> = {
    point: 0,
    line: 0,
    triangle: 0,
    polyline: 0,
    polygon: 0,
  };
  let vertices = 0;
  for (const shape of scene.shapes) {
    vertices += shape.vertexCount;
    elements[elementTypeName(shape.elementType)] += shape.elementCount;
  }
  return {
    shapes: scene.shapes.length,
    vertices,
    elements,
    materials: scene.materials.length,
    textures: scene.textures.length,
    loadedTextures: scene.textures.filter((t) => t.pixels !== null).length,
    cameras: scene.cameras.length,
    environments: scene.environments.length,
  };
}
