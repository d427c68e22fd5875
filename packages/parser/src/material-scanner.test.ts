/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { FormatError, createScene } from '@objkit/data';
import { scanMaterialLibrary } from './material-scanner.js';

const LIBRARY = [
  '# two materials',
  'newmtl red plastic',
  'Kd 1 0 0',
  'Ks 0.5 0.5 0.5',
  'Ns 32',
  'illum 2',
  'map_Kd -clamp on textures/red.png',
  '',
  'newmtl glass',
  'Tf 0.9 0.9 1',
  'Tr 0.75',
  'Ni 1.5',
  'map_Kd textures/red.png',
  'bump textures/glass_n.png',
  'Pr 0.3',
].join('\n');

describe('scanMaterialLibrary', () => {
  it('reads materials in order with their properties', () => {
    const scene = createScene();
    const added = scanMaterialLibrary(LIBRARY, scene);

    expect(added).toBe(2);
    const [red, glass] = scene.materials;

    expect(red.name).toBe('red plastic');
    expect(red.kd).toEqual({ x: 1, y: 0, z: 0 });
    expect(red.ks).toEqual({ x: 0.5, y: 0.5, z: 0.5 });
    expect(red.ns).toBe(32);
    expect(red.illum).toBe(2);
    expect(red.op).toBe(1);

    expect(glass.name).toBe('glass');
    expect(glass.kt).toEqual({ x: Math.fround(0.9), y: Math.fround(0.9), z: 1 });
    expect(glass.op).toBe(Math.fround(1 - Math.fround(0.75)));
    expect(glass.ior).toBe(1.5);
  });

  it('takes the last token of a map record as the path and shares textures', () => {
    const scene = createScene();
    scanMaterialLibrary(LIBRARY, scene);

    expect(scene.textures.map((t) => t.path)).toEqual(['textures/red.png', 'textures/glass_n.png']);
    const [red, glass] = scene.materials;
    expect(red.textures.kd).toEqual({ path: 'textures/red.png', index: 0 });
    expect(glass.textures.kd).toEqual({ path: 'textures/red.png', index: 0 });
    expect(glass.textures.bump).toEqual({ path: 'textures/glass_n.png', index: 1 });
    expect(red.textures.bump).toEqual({ path: '', index: -1 });
  });

  it('maps dissolve to opacity directly', () => {
    const scene = createScene();
    scanMaterialLibrary('newmtl a\nd 0.25\nmap_d alpha.png', scene);
    expect(scene.materials[0].op).toBe(0.25);
    expect(scene.materials[0].textures.op.path).toBe('alpha.png');
  });

  it('appends to materials already in the scene', () => {
    const scene = createScene();
    scanMaterialLibrary('newmtl a', scene);
    expect(scanMaterialLibrary('newmtl b\nnewmtl c', scene)).toBe(2);
    expect(scene.materials.map((m) => m.name)).toEqual(['a', 'b', 'c']);
  });

  it('rejects properties before the first newmtl', () => {
    const scene = createScene();
    expect(() => scanMaterialLibrary('Kd 1 1 1', scene, { source: 'lib.mtl' })).toThrow(
      "lib.mtl:1: 'Kd' appears before any newmtl"
    );
  });

  it('rejects short and malformed values', () => {
    expect(() => scanMaterialLibrary('newmtl a\nKd 1 1', createScene())).toThrow(
      "line 2: 'Kd' expects at least 3 values, got 2"
    );
    expect(() => scanMaterialLibrary('newmtl a\nNs shiny', createScene())).toThrow(FormatError);
    expect(() => scanMaterialLibrary('newmtl a\nillum 2.5', createScene())).toThrow("invalid integer '2.5'");
  });
});
