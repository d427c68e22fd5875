/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @objkit/parser - OBJ/MTL ingestion into indexed shapes
 *
 * @example
 * ```typescript
 * import { loadObj } from '@objkit/parser';
 *
 * const scene = loadObj('models/room.obj', { triangulate: true });
 * for (const shape of scene.shapes) {
 *   console.log(shape.name, shape.vertexCount, shape.elementCount);
 * }
 * ```
 */

export { parseObj } from './obj-parser.js';
export type { ObjParseOptions } from './obj-parser.js';
export { loadObj, readTextFile } from './load.js';
export type { LoadObjOptions } from './load.js';

export { scanMaterialLibrary } from './material-scanner.js';
export type { MaterialScanOptions } from './material-scanner.js';

export { ShapeAssembler } from './shape-assembler.js';
export type { ShapeAssemblerOptions } from './shape-assembler.js';
export { compactElements } from './element-compactor.js';
export type { CompactedElements } from './element-compactor.js';
export { VertexTable, parseVertexReference, ABSENT } from './vertex-table.js';
export type { AttributeReference, ResolvedVertex } from './vertex-table.js';
export { AttributePools, Attribute, ATTRIBUTE_COUNT, ATTRIBUTE_WIDTH } from './attribute-pools.js';
export { tokenizeLine, scanLines, isSkippable, DEFAULT_MAX_TOKENS } from './tokenizer.js';
export type { SourceLine } from './tokenizer.js';
