/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Scene model types
 */

export interface Vec2 {
  x: number;
  y: number;
}

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/**
 * 3x4 affine transform, column major: x axis, y axis, z axis, translation.
 * Always 12 values.
 */
export type Affine3 = Float32Array;

/** Element (primitive) types, numbered as in the binary dump */
export enum ElementType {
  Point = 1,
  Line = 2,
  Triangle = 3,
  Polyline = 12,
  Polygon = 13,
}

/**
 * Indexed mesh emitted for each run of records sharing name, group,
 * material and element kind.
 */
export interface Shape {
  name: string;
  groupName: string;
  materialName: string;
  /** Index into Scene.materials, -1 if the name did not resolve */
  materialIndex: number;

  elementType: ElementType;
  elementCount: number;
  /**
   * Fixed types: elementCount * stride local vertex ids.
   * Variable types: [count, id0..id(count-1)] runs.
   */
  elements: Int32Array;

  vertexCount: number;
  // Per-vertex data; each is either empty or exactly vertexCount entries
  positions: Float32Array; // 3 per vertex
  normals: Float32Array; // 3 per vertex
  texcoords: Float32Array; // 2 per vertex
  colors: Float32Array; // 3 per vertex
  radius: Float32Array; // 1 per vertex

  transformed: boolean;
  transform: Affine3;
}

export const TEXTURE_CHANNELS = [
  'ke',
  'ka',
  'kd',
  'ks',
  'kr',
  'kt',
  'ns',
  'op',
  'ior',
  'bump',
  'disp',
] as const;

export type TextureChannel = (typeof TEXTURE_CHANNELS)[number];

export interface TextureRef {
  /** Path as written in the material library, empty when unset */
  path: string;
  /** Index into Scene.textures, -1 when unset */
  index: number;
}

export interface Material {
  name: string;
  /** MTL illumination model */
  illum: number;

  ke: Vec3; // emission
  ka: Vec3; // ambient
  kd: Vec3; // diffuse
  ks: Vec3; // specular
  kr: Vec3; // reflection
  kt: Vec3; // transmission

  /** Phong exponent */
  ns: number;
  /** Index of refraction */
  ior: number;
  /** Opacity */
  op: number;

  textures: Record<TextureChannel, TextureRef>;
}

export interface Texture {
  path: string;
  width: number;
  height: number;
  components: number;
  /** Decoded pixels, null until textures are loaded */
  pixels: Float32Array | null;
}

/** Look-at camera */
export interface Camera {
  name: string;
  from: Vec3;
  to: Vec3;
  up: Vec3;
  width: number;
  height: number;
  aperture: number;
}

/** Environment map placed with a look-at frame */
export interface Environment {
  name: string;
  materialName: string;
  materialIndex: number;
  from: Vec3;
  to: Vec3;
  up: Vec3;
}

export interface Scene {
  shapes: Shape[];
  materials: Material[];
  textures: Texture[];
  cameras: Camera[];
  environments: Environment[];
}
