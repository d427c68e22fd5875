/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Binary dump format for .objbin files
 *
 * Layout (little-endian, no padding):
 *   magic             uint32
 *   cameras           uint32 count, then per camera:
 *                       name, from, to, up, width, height, aperture
 *   environments      uint32 count, then per environment:
 *                       name, materialName, from, to, up
 *   materials         uint32 count, then per material:
 *                       name, illum (int32), ke ka kd ks kr kt, ns, ior, op,
 *                       texture paths in TEXTURE_CHANNELS order
 *   shapes            uint32 count, then per shape:
 *                       name, groupName, materialName, elementCount (uint32),
 *                       elements (int32 vector), elementType (uint32),
 *                       vertexCount (uint32), positions, normals, texcoords,
 *                       colors, radius (float32 vectors), transformed (uint8),
 *                       transform (12 float32)
 *
 * Strings are a uint32 byte length followed by UTF-8 bytes. Vectors are a
 * uint32 count of scalars followed by the raw values. Vec3 fields are three
 * float32 values.
 */

/** Leading uint32 of every dump */
export const MAGIC = 0xaf45e782;

export interface BinaryDumpOptions {
  /**
   * Include cameras, environments and vertex colors/radius (default: false).
   * Without it the writer stores none and the reader drops any it finds.
   */
  extensions?: boolean;
}
