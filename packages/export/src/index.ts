/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @objkit/export - OBJ and MTL writers
 */

export { serializeObj } from './obj-writer.js';
export type { ObjWriteOptions, SerializedObj } from './obj-writer.js';

export { serializeMtl, serializeMaterial } from './mtl-writer.js';

export { saveObj, writeTextFile } from './save.js';
export type { SaveObjOptions } from './save.js';

export { formatFloat } from './format.js';
