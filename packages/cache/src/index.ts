/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @objkit/cache - Binary dump format for fast scene reloading
 *
 * @example
 * ```typescript
 * import { BinaryDumpWriter, BinaryDumpReader } from '@objkit/cache';
 *
 * const bytes = new BinaryDumpWriter().write(scene, { extensions: true });
 * const reloaded = new BinaryDumpReader().read(bytes, { extensions: true });
 * ```
 */

export { BinaryDumpWriter } from './writer.js';
export { BinaryDumpReader } from './reader.js';
export { saveObjbin, loadObjbin } from './io.js';

export { MAGIC } from './types.js';
export type { BinaryDumpOptions } from './types.js';

// Utilities
export { BufferWriter, BufferReader } from './utils/buffer-utils.js';
