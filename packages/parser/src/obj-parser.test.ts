/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, vi } from 'vitest';
import { ElementType, FormatError, IoError } from '@objkit/data';
import { parseObj } from './obj-parser.js';

const QUAD = ['v 0 0 0', 'v 1 0 0', 'v 1 1 0', 'v 0 1 0'].join('\n');

describe('parseObj', () => {
  describe('faces', () => {
    it('keeps a quad as a polygon run', () => {
      const scene = parseObj(`${QUAD}\nf 1 2 3 4`);
      expect(scene.shapes).toHaveLength(1);
      const shape = scene.shapes[0];
      expect(shape.elementType).toBe(ElementType.Polygon);
      expect(shape.elementCount).toBe(1);
      expect(Array.from(shape.elements)).toEqual([4, 0, 1, 2, 3]);
      expect(shape.vertexCount).toBe(4);
      expect(Array.from(shape.positions)).toEqual([0, 0, 0, 1, 0, 0, 1, 1, 0, 0, 1, 0]);
      expect(shape.normals.length).toBe(0);
      expect(shape.texcoords.length).toBe(0);
    });

    it('fan-triangulates when asked', () => {
      const scene = parseObj(`${QUAD}\nf 1 2 3 4`, { triangulate: true });
      const shape = scene.shapes[0];
      expect(shape.elementType).toBe(ElementType.Triangle);
      expect(shape.elementCount).toBe(2);
      expect(Array.from(shape.elements)).toEqual([0, 1, 2, 0, 2, 3]);
    });

    it('fans an N-gon into N-2 triangles sharing its first vertex', () => {
      const text = ['v 0 0 0', 'v 1 0 0', 'v 2 1 0', 'v 1 2 0', 'v 0 1 0', 'f 1 2 3 4 5'].join('\n');
      const shape = parseObj(text, { triangulate: true }).shapes[0];
      expect(shape.elementType).toBe(ElementType.Triangle);
      expect(shape.elementCount).toBe(3);
      expect(shape.vertexCount).toBe(5);
      expect(Array.from(shape.elements)).toEqual([0, 1, 2, 0, 2, 3, 0, 3, 4]);
    });

    it('compacts faces that are all triangles', () => {
      const scene = parseObj(`${QUAD}\nf 1 2 3\nf 1 3 4`);
      const shape = scene.shapes[0];
      expect(shape.elementType).toBe(ElementType.Triangle);
      expect(Array.from(shape.elements)).toEqual([0, 1, 2, 0, 2, 3]);
    });

    it('keeps mixed faces run-length encoded', () => {
      const scene = parseObj(`${QUAD}\nv 2 0 0\nf 1 2 3 4\nf 2 5 3`);
      const shape = scene.shapes[0];
      expect(shape.elementType).toBe(ElementType.Polygon);
      expect(shape.elementCount).toBe(2);
      expect(Array.from(shape.elements)).toEqual([4, 0, 1, 2, 3, 3, 1, 4, 2]);
    });

    it('deduplicates identical vertex tuples within a shape', () => {
      const text = [QUAD, 'vt 0 0', 'vt 1 1', 'f 1/1 2/1 3/2', 'f 1/1 3/2 4/1'].join('\n');
      const shape = parseObj(text).shapes[0];
      expect(shape.vertexCount).toBe(4);
      expect(Array.from(shape.elements)).toEqual([0, 1, 2, 0, 2, 3]);
      expect(Array.from(shape.texcoords)).toEqual([0, 0, 0, 0, 1, 1, 0, 0]);
    });

    it('splits a position into two vertices when its texcoord differs', () => {
      const text = [QUAD, 'vt 0 0', 'vt 1 1', 'f 1/1 2/1 3/1', 'f 1/2 3/1 4/1'].join('\n');
      const shape = parseObj(text).shapes[0];
      expect(shape.vertexCount).toBe(5);
      expect(Array.from(shape.elements)).toEqual([0, 1, 2, 3, 2, 4]);
    });

    it('resolves negative indices relative to the attributes defined so far', () => {
      const text = ['v 0 0 0', 'v 1 0 0', 'v 0 1 0', 'f -3 -2 -1', 'v 5 5 5', 'f -4 -1 -2'].join('\n');
      const shape = parseObj(text).shapes[0];
      expect(Array.from(shape.elements)).toEqual([0, 1, 2, 0, 3, 2]);
      expect(Array.from(shape.positions.subarray(9, 12))).toEqual([5, 5, 5]);
    });

    it('copies vertex normals and texcoords per local vertex', () => {
      const text = ['v 0 0 0', 'v 1 0 0', 'v 0 1 0', 'vn 0 0 1', 'vt 0.5', 'f 1/1/1 2/1/1 3/1/1'].join('\n');
      const shape = parseObj(text).shapes[0];
      expect(Array.from(shape.normals)).toEqual([0, 0, 1, 0, 0, 1, 0, 0, 1]);
      expect(Array.from(shape.texcoords)).toEqual([0.5, 0, 0.5, 0, 0.5, 0]);
    });

    it('stores values at single precision', () => {
      const shape = parseObj('v 0.1 0 0\np 1').shapes[0];
      expect(shape.positions[0]).toBe(Math.fround(0.1));
    });

    it('reads decimal literals in their short forms and non-finite words', () => {
      const shape = parseObj('v .5 1. +2e1\nv -inf NaN Infinity\np 1 2').shapes[0];
      expect(Array.from(shape.positions)).toEqual([0.5, 1, 20, -Infinity, NaN, Infinity]);
    });
  });

  describe('lines and points', () => {
    it('keeps long lines as polylines', () => {
      const shape = parseObj(`${QUAD}\nl 1 2 3 4`).shapes[0];
      expect(shape.elementType).toBe(ElementType.Polyline);
      expect(Array.from(shape.elements)).toEqual([4, 0, 1, 2, 3]);
    });

    it('splits lines into segments when triangulating', () => {
      const shape = parseObj(`${QUAD}\nl 1 2 3 4`, { triangulate: true }).shapes[0];
      expect(shape.elementType).toBe(ElementType.Line);
      expect(shape.elementCount).toBe(3);
      expect(Array.from(shape.elements)).toEqual([0, 1, 1, 2, 2, 3]);
    });

    it('compacts two-vertex polylines into lines', () => {
      const shape = parseObj(`${QUAD}\nl 1 2\nl 3 4`).shapes[0];
      expect(shape.elementType).toBe(ElementType.Line);
      expect(Array.from(shape.elements)).toEqual([0, 1, 2, 3]);
    });

    it('collects points', () => {
      const shape = parseObj(`${QUAD}\np 1 2\np 4`).shapes[0];
      expect(shape.elementType).toBe(ElementType.Point);
      expect(shape.elementCount).toBe(3);
      expect(Array.from(shape.elements)).toEqual([0, 1, 2]);
    });
  });

  describe('shape boundaries', () => {
    it('starts a new shape on o, g, usemtl and element kind changes', () => {
      const text = [
        QUAD,
        'o first',
        'f 1 2 3',
        'g side',
        'f 1 3 4',
        'usemtl paint',
        'f 1 2 3',
        'l 1 2',
        'o second',
        'p 1',
      ].join('\n');
      const scene = parseObj(text);
      expect(
        scene.shapes.map((s) => [s.name, s.groupName, s.materialName, s.elementType])
      ).toEqual([
        ['first', '', '', ElementType.Triangle],
        ['first', 'side', '', ElementType.Triangle],
        ['first', 'side', 'paint', ElementType.Triangle],
        ['first', 'side', 'paint', ElementType.Line],
        ['second', '', '', ElementType.Point],
      ]);
    });

    it('restarts local vertex ids in every shape', () => {
      const scene = parseObj(`${QUAD}\no a\nf 2 3 4\no b\nf 4 3 2`);
      expect(Array.from(scene.shapes[1].elements)).toEqual([0, 1, 2]);
      expect(Array.from(scene.shapes[1].positions.subarray(0, 3))).toEqual([0, 1, 0]);
    });

    it('emits nothing for empty shapes', () => {
      const scene = parseObj(`${QUAD}\no empty\ng also\nusemtl none\no real\nf 1 2 3`);
      expect(scene.shapes).toHaveLength(1);
      expect(scene.shapes[0].name).toBe('real');
    });

    it('keeps names with spaces', () => {
      const scene = parseObj(`${QUAD}\no my  object\nf 1 2 3`);
      expect(scene.shapes[0].name).toBe('my object');
    });

    it('returns an empty scene for blank input and comments', () => {
      const scene = parseObj('# nothing\n\n   \n');
      expect(scene.shapes).toEqual([]);
      expect(scene.materials).toEqual([]);
    });
  });

  describe('materials', () => {
    it('loads mtllib relative to baseDir and resolves material indices', () => {
      const readTextFile = vi.fn((filePath: string) => {
        if (filePath === 'models/lib.mtl') return 'newmtl Red\nKd 1 0 0';
        throw new Error(`unexpected ${filePath}`);
      });
      const text = `mtllib lib.mtl\n${QUAD}\nusemtl red\nf 1 2 3\nusemtl missing\nf 1 3 4`;
      const scene = parseObj(text, { baseDir: 'models', readTextFile });

      expect(readTextFile).toHaveBeenCalledWith('models/lib.mtl');
      expect(scene.materials.map((m) => m.name)).toEqual(['Red']);
      expect(scene.shapes[0].materialName).toBe('red');
      expect(scene.shapes[0].materialIndex).toBe(0);
      expect(scene.shapes[1].materialIndex).toBe(-1);
    });

    it('fails when mtllib appears without a reader', () => {
      expect(() => parseObj('mtllib lib.mtl')).toThrow(IoError);
    });
  });

  describe('extensions', () => {
    const text = [
      'v 0 0 0',
      'v 1 0 0',
      'v 0 1 0',
      'vc 1 0 0',
      'vr 0.25',
      'o tube',
      'xf 2 0 0 0 2 0 0 0 2 1 2 3',
      'l 1//// 2//// 3////',
      'f 1///1/1 2///1/1 3///1/1',
    ].join('\n');

    it('ignores extension records unless enabled', () => {
      const scene = parseObj(text);
      expect(scene.shapes).toHaveLength(2);
      const face = scene.shapes[1];
      expect(face.colors.length).toBe(0);
      expect(face.radius.length).toBe(0);
      expect(face.transformed).toBe(false);
    });

    it('reads colors, radius and transforms when enabled', () => {
      const scene = parseObj(text, { extensions: true });
      const face = scene.shapes[1];
      expect(Array.from(face.colors)).toEqual([1, 0, 0, 1, 0, 0, 1, 0, 0]);
      expect(Array.from(face.radius)).toEqual([0.25, 0.25, 0.25]);
      expect(face.transformed).toBe(true);
      expect(Array.from(face.transform)).toEqual([2, 0, 0, 0, 2, 0, 0, 0, 2, 1, 2, 3]);
    });

    it('resets the transform on a new object', () => {
      const scene = parseObj(`${text}\no plain\nf 1 2 3`, { extensions: true });
      expect(scene.shapes[2].transformed).toBe(false);
    });

    it('reads cameras from c records', () => {
      const cameraText = [
        'v 0 0 5',
        'v 0 0 0',
        'vn 0 1 0',
        'vt 0.1 0.1',
        'vt 0.036 0.024',
        'o cam',
        'c 1/1/1 2/2/1',
      ].join('\n');
      const scene = parseObj(cameraText, { extensions: true });
      expect(scene.cameras).toHaveLength(1);
      const camera = scene.cameras[0];
      expect(camera.name).toBe('cam');
      expect(camera.from).toEqual({ x: 0, y: 0, z: 5 });
      expect(camera.to).toEqual({ x: 0, y: 0, z: 0 });
      expect(camera.up).toEqual({ x: 0, y: 1, z: 0 });
      expect(camera.width).toBe(Math.fround(0.036));
      expect(camera.height).toBe(Math.fround(0.024));
      expect(camera.aperture).toBe(Math.fround(0.1));
      expect(scene.shapes).toHaveLength(0);
    });

    it('reads environments and clears the name afterwards', () => {
      const readTextFile = (): string => 'newmtl sky\nKe 1 1 1\nmap_Ke sky.hdr';
      const envText = [
        'mtllib sky.mtl',
        'v 0 0 0',
        'v 0 0 1',
        'o env',
        'usemtl sky',
        'e 1 2',
        'f 1 2 1',
      ].join('\n');
      const scene = parseObj(envText, { extensions: true, readTextFile });
      expect(scene.environments).toHaveLength(1);
      const environment = scene.environments[0];
      expect(environment.name).toBe('env');
      expect(environment.materialIndex).toBe(0);
      expect(environment.to).toEqual({ x: 0, y: 0, z: 1 });
      expect(environment.up).toEqual({ x: 0, y: 1, z: 0 });
      expect(scene.shapes[0].name).toBe('');
      expect(scene.shapes[0].materialName).toBe('');
    });

    it('skips camera records without extensions', () => {
      const scene = parseObj('v 0 0 0\nv 0 0 1\nc 1 2');
      expect(scene.cameras).toEqual([]);
    });
  });

  describe('errors', () => {
    it('reports the line of a bad vertex reference', () => {
      expect(() => parseObj(`${QUAD}\nf 1 2 9`, { source: 'bad.obj' })).toThrow(
        "bad.obj:5: vertex reference '9' is out of range (4 defined)"
      );
    });

    it('rejects faces with fewer than three vertices', () => {
      expect(() => parseObj(`${QUAD}\nf 1 2`)).toThrow("line 5: 'f' needs at least 3 vertices, got 2");
    });

    it('rejects short vertex records', () => {
      expect(() => parseObj('v 1 2')).toThrow("line 1: 'v' expects at least 3 values, got 2");
    });

    it('rejects non-numeric values', () => {
      expect(() => parseObj('v 1 two 3')).toThrow("invalid number 'two'");
      expect(() => parseObj('v 0x10 0 0')).toThrow("line 1: invalid number '0x10'");
      expect(() => parseObj('v 1_0 0 0')).toThrow("invalid number '1_0'");
      expect(() => parseObj('v 1 2 3e')).toThrow("invalid number '3e'");
    });

    it('rejects vertices whose attributes differ from the rest of the shape', () => {
      const text = `${QUAD}\nvt 0 0\nf 1/1 2/1 3`;
      expect(() => parseObj(text)).toThrow(FormatError);
      expect(() => parseObj(text)).toThrow("vertex '3' does not use the same attributes");
    });

    it('rejects records over the token limit', () => {
      expect(() => parseObj(`${QUAD}\nf 1 2 3 4`, { maxTokens: 4 })).toThrow('record has more than 4 tokens');
    });
  });
});
