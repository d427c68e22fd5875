/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * OBJ parser - a single left-to-right fold over the records of an OBJ text
 */

import * as path from 'path';
import { IoError, createLogger, createScene, sceneStats, type Scene } from '@objkit/data';
import { scanMaterialLibrary } from './material-scanner.js';
import { ShapeAssembler } from './shape-assembler.js';
import { DEFAULT_MAX_TOKENS, isSkippable, scanLines, tokenizeLine } from './tokenizer.js';
import {
  joinRest,
  parseFloat32,
  parseVec3,
  requireValues,
  type RecordContext,
} from './values.js';

const log = createLogger('Parser');

export interface ObjParseOptions {
  /** Fan-triangulate faces and split polylines into segments (default: false) */
  triangulate?: boolean;
  /** Read vc/vr/xf/c/e records and color/radius vertex components (default: false) */
  extensions?: boolean;
  /** Directory `mtllib` paths are relative to (default: '') */
  baseDir?: string;
  /** Reads a material library; required when the text has `mtllib` records */
  readTextFile?: (filePath: string) => string;
  /** Token limit per record (default: 1024) */
  maxTokens?: number;
  /** File name used in error messages */
  source?: string;
}

/** Records that only mean something with extensions enabled */
const EXTENSION_RECORDS = new Set(['vc', 'vr', 'xf', 'c', 'e']);

/**
 * Parse OBJ text into a scene.
 * Throws FormatError or IoError; never returns a partial scene.
 */
export function parseObj(text: string, options: ObjParseOptions = {}): Scene {
  const {
    triangulate = false,
    extensions = false,
    baseDir = '',
    readTextFile,
    maxTokens = DEFAULT_MAX_TOKENS,
    source,
  } = options;

  const scene = createScene();
  const assembler = new ShapeAssembler(scene, { triangulate, extensions, source });
  const pools = assembler.pools;
  const ignored = new Set<string>();

  for (const { text: line, lineNumber } of scanLines(text)) {
    const tokens = tokenizeLine(line, maxTokens, source, lineNumber);
    if (isSkippable(tokens)) continue;

    const ctx: RecordContext = { source, lineNumber };
    const keyword = tokens[0];

    if (!extensions && EXTENSION_RECORDS.has(keyword)) {
      continue;
    }

    switch (keyword) {
      case 'v':
        requireValues(tokens, 3, ctx);
        pools.addPosition(parseVec3(tokens, 1, ctx));
        break;
      case 'vt':
        requireValues(tokens, 1, ctx);
        pools.addTexcoord({
          x: parseFloat32(tokens[1], ctx),
          y: tokens.length > 2 ? parseFloat32(tokens[2], ctx) : 0,
        });
        break;
      case 'vn':
        requireValues(tokens, 3, ctx);
        pools.addNormal(parseVec3(tokens, 1, ctx));
        break;
      case 'vc':
        requireValues(tokens, 3, ctx);
        pools.addColor(parseVec3(tokens, 1, ctx));
        break;
      case 'vr':
        requireValues(tokens, 1, ctx);
        pools.addRadius(parseFloat32(tokens[1], ctx));
        break;
      case 'xf': {
        requireValues(tokens, 12, ctx);
        const transform = new Float32Array(12);
        for (let i = 0; i < 12; i++) {
          transform[i] = parseFloat32(tokens[i + 1], ctx);
        }
        assembler.setTransform(transform);
        break;
      }
      case 'p':
        assembler.addPoints(tokens, ctx);
        break;
      case 'l':
        assembler.addLine(tokens, ctx);
        break;
      case 'f':
        assembler.addFace(tokens, ctx);
        break;
      case 'c':
        assembler.addCamera(tokens, ctx);
        break;
      case 'e':
        assembler.addEnvironment(tokens, ctx);
        break;
      case 'o':
        assembler.beginObject(joinRest(tokens));
        break;
      case 'g':
        assembler.beginGroup(joinRest(tokens));
        break;
      case 'usemtl':
        assembler.useMaterial(joinRest(tokens));
        break;
      case 'mtllib':
        requireValues(tokens, 1, ctx);
        for (let t = 1; t < tokens.length; t++) {
          loadMaterialLibrary(scene, path.join(baseDir, tokens[t]), readTextFile, maxTokens);
        }
        break;
      default:
        if (!ignored.has(keyword)) {
          ignored.add(keyword);
          log.debug(`ignoring '${keyword}' records`, undefined, ctx);
        }
        break;
    }
  }

  assembler.flush();

  log.info('parsed scene', { source, data: { ...sceneStats(scene) } });
  return scene;
}

function loadMaterialLibrary(
  scene: Scene,
  filePath: string,
  readTextFile: ObjParseOptions['readTextFile'],
  maxTokens: number
): void {
  if (!readTextFile) {
    throw new IoError(`No reader available for material library ${filePath}`, filePath);
  }
  scanMaterialLibrary(readTextFile(filePath), scene, { source: filePath, maxTokens });
}
