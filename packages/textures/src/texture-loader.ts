/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Texture loader - decodes every unloaded texture of a scene into float
 * pixels. Decoding itself is delegated to an ImageDecoder.
 */

import * as path from 'path';
import {
  FormatError,
  IoError,
  ObjKitError,
  createLogger,
  type Scene,
  type Texture,
} from '@objkit/data';

const log = createLogger('Textures');

/** Pixels as a decoder produces them: 8-bit or float, row-major, top row first */
export interface DecodedImage {
  width: number;
  height: number;
  components: number;
  pixels: Uint8Array | Uint8ClampedArray | Float32Array;
}

export interface ImageDecoder {
  /**
   * Decode the image at `filePath`. A non-zero `requestedComponents` asks
   * for that many channels per pixel.
   */
  decode(filePath: string, requestedComponents: number): Promise<DecodedImage>;
}

/** What to do when one texture cannot be loaded */
export type TextureErrorPolicy = 'abort' | 'skip';

export interface LoadTexturesOptions {
  decoder: ImageDecoder;
  /** Channels per pixel, 0 keeps what the file has (default: 0) */
  requestedComponents?: number;
  /** Store the bottom row first (default: true) */
  flipVertically?: boolean;
  /** 'abort' rejects on the first failure, 'skip' leaves the texture unloaded (default: 'abort') */
  onError?: TextureErrorPolicy;
}

export interface TextureLoadFailure {
  path: string;
  error: ObjKitError;
}

export interface TextureLoadSummary {
  loaded: number;
  failed: TextureLoadFailure[];
}

type DecodeOutcome =
  | { texture: Texture; pixels: Float32Array; image: DecodedImage }
  | { texture: Texture; failure: TextureLoadFailure };

/**
 * Load the pixels of every texture in `scene` that has none yet.
 * Texture paths are resolved against the directory of `basePath`, the file
 * the scene was loaded from. All decodes run concurrently; with
 * `onError: 'abort'` the scene is left untouched when any of them fails.
 */
export async function loadTextures(
  scene: Scene,
  basePath: string,
  options: LoadTexturesOptions
): Promise<TextureLoadSummary> {
  const { decoder, requestedComponents = 0, flipVertically = true, onError = 'abort' } = options;
  const baseDir = path.dirname(basePath);
  const pending = scene.textures.filter((texture) => texture.pixels === null);

  const outcomes = await Promise.all(
    pending.map(async (texture): Promise<DecodeOutcome> => {
      const filePath = path.isAbsolute(texture.path) ? texture.path : path.join(baseDir, texture.path);
      try {
        const image = await decodeTexture(decoder, filePath, requestedComponents);
        const pixels = normalizePixels(image);
        if (flipVertically) {
          flipRows(pixels, image.width, image.height, image.components);
        }
        return { texture, pixels, image };
      } catch (error) {
        const failure = { path: texture.path, error: toObjKitError(error, filePath) };
        if (onError === 'abort') {
          throw failure.error;
        }
        log.warn(`skipping texture ${texture.path}: ${failure.error.message}`);
        return { texture, failure };
      }
    })
  );

  const summary: TextureLoadSummary = { loaded: 0, failed: [] };
  for (const outcome of outcomes) {
    if ('failure' in outcome) {
      summary.failed.push(outcome.failure);
      continue;
    }
    const { texture, pixels, image } = outcome;
    texture.width = image.width;
    texture.height = image.height;
    texture.components = image.components;
    texture.pixels = pixels;
    summary.loaded++;
  }

  log.info('loaded textures', { data: { loaded: summary.loaded, failed: summary.failed.length } });
  return summary;
}

async function decodeTexture(
  decoder: ImageDecoder,
  filePath: string,
  requestedComponents: number
): Promise<DecodedImage> {
  const image = await decoder.decode(filePath, requestedComponents);
  const { width, height, components, pixels } = image;

  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new FormatError(`invalid image size ${width}x${height}`, filePath);
  }
  if (!Number.isInteger(components) || components < 1 || components > 4) {
    throw new FormatError(`invalid component count ${components}`, filePath);
  }
  if (requestedComponents !== 0 && components !== requestedComponents) {
    throw new FormatError(`decoded ${components} components, ${requestedComponents} requested`, filePath);
  }
  if (pixels.length !== width * height * components) {
    throw new FormatError(
      `pixel buffer holds ${pixels.length} values, expected ${width * height * components}`,
      filePath
    );
  }
  return image;
}

/** Float pixels are copied as they are, 8-bit pixels are scaled to [0, 1] */
export function normalizePixels(image: DecodedImage): Float32Array {
  const source = image.pixels;
  if (source instanceof Float32Array) {
    return Float32Array.from(source);
  }
  const pixels = new Float32Array(source.length);
  for (let i = 0; i < source.length; i++) {
    pixels[i] = source[i] / 255;
  }
  return pixels;
}

/** Reverse the row order in place */
export function flipRows(pixels: Float32Array, width: number, height: number, components: number): void {
  const rowLength = width * components;
  const row = new Float32Array(rowLength);
  for (let top = 0, bottom = height - 1; top < bottom; top++, bottom--) {
    const topStart = top * rowLength;
    const bottomStart = bottom * rowLength;
    row.set(pixels.subarray(topStart, topStart + rowLength));
    pixels.copyWithin(topStart, bottomStart, bottomStart + rowLength);
    pixels.set(row, bottomStart);
  }
}

function toObjKitError(error: unknown, filePath: string): ObjKitError {
  if (error instanceof ObjKitError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new IoError(`Cannot load texture ${filePath}: ${message}`, filePath, error);
}
