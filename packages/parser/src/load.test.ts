/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ElementType, IoError } from '@objkit/data';
import { loadObj } from './load.js';

describe('loadObj', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'objkit-load-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads an OBJ file with a material library beside it', () => {
    fs.mkdirSync(path.join(dir, 'materials'));
    fs.writeFileSync(path.join(dir, 'materials', 'box.mtl'), 'newmtl box\nKd 0.5 0.5 0.5\nmap_Kd box.png\n');
    fs.writeFileSync(
      path.join(dir, 'box.obj'),
      'mtllib materials/box.mtl\nv 0 0 0\nv 1 0 0\nv 1 1 0\nv 0 1 0\nusemtl box\nf 1 2 3 4\n'
    );

    const scene = loadObj(path.join(dir, 'box.obj'), { triangulate: true });
    expect(scene.materials).toHaveLength(1);
    expect(scene.textures.map((t) => t.path)).toEqual(['box.png']);
    expect(scene.shapes[0].materialIndex).toBe(0);
    expect(scene.shapes[0].elementType).toBe(ElementType.Triangle);
    expect(scene.shapes[0].elementCount).toBe(2);
  });

  it('throws IoError for a missing file', () => {
    const missing = path.join(dir, 'missing.obj');
    expect(() => loadObj(missing)).toThrow(IoError);
    try {
      loadObj(missing);
    } catch (error) {
      expect(error).toBeInstanceOf(IoError);
      expect(error instanceof IoError && error.path).toBe(missing);
    }
  });

  it('throws IoError for a missing material library', () => {
    fs.writeFileSync(path.join(dir, 'lonely.obj'), 'mtllib nowhere.mtl\n');
    expect(() => loadObj(path.join(dir, 'lonely.obj'))).toThrow(`Cannot read ${path.join(dir, 'nowhere.mtl')}`);
  });

  it('names the file in format errors', () => {
    const file = path.join(dir, 'broken.obj');
    fs.writeFileSync(file, 'v 0 0 0\nf 1 1\n');
    expect(() => loadObj(file)).toThrow(`${file}:2: 'f' needs at least 3 vertices, got 2`);
  });
});
