/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @objkit/textures - Texture loading over a pluggable image decoder
 */

export { loadTextures, normalizePixels, flipRows } from './texture-loader.js';
export type {
  DecodedImage,
  ImageDecoder,
  LoadTexturesOptions,
  TextureErrorPolicy,
  TextureLoadFailure,
  TextureLoadSummary,
} from './texture-loader.js';
