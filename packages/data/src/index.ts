/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @objkit/data - Scene model, errors and logging shared by all packages
 */

export { ElementType, TEXTURE_CHANNELS } from './types.js';
export type {
  Vec2,
  Vec3,
  Affine3,
  Shape,
  TextureChannel,
  TextureRef,
  Material,
  Texture,
  Camera,
  Environment,
  Scene,
} from './types.js';

export {
  createScene,
  vec3,
  identityAffine3,
  isIdentityAffine3,
  elementStride,
  isVariableElementType,
  elementTypeName,
  isElementType,
  createMaterial,
  createTexture,
  createCamera,
  createEnvironment,
  findMaterialIndex,
  addUniqueTexture,
  resolveMaterialTextures,
  sceneStats,
} from './scene.js';
export type { ElementTypeName, SceneStats } from './scene.js';

export { ObjKitError, IoError, FormatError, MagicMismatchError } from './errors.js';

export { createLogger, isDebugEnabled } from './logger.js';
export type { Logger, LogContext } from './logger.js';
