/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CLI for inspecting and converting OBJ scenes and binary dumps
 */

import * as path from 'path';
import { Command } from 'commander';
import { ObjKitError, createLogger, sceneStats, type ElementTypeName, type Scene } from '@objkit/data';
import { loadObj } from '@objkit/parser';
import { saveObj } from '@objkit/export';
import { loadObjbin, saveObjbin } from '@objkit/cache';

const log = createLogger('CLI');

type SceneFormat = 'obj' | 'objbin';

interface LoadFlags {
  triangulate: boolean;
  extensions: boolean;
}

const ELEMENT_NAMES: readonly ElementTypeName[] = ['point', 'line', 'triangle', 'polyline', 'polygon'];

export function formatOf(filePath: string): SceneFormat {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.obj') return 'obj';
  if (extension === '.objbin') return 'objbin';
  throw new ObjKitError(`Unsupported file extension '${extension}' in ${filePath} (expected .obj or .objbin)`);
}

export function loadScene(filePath: string, flags: LoadFlags): Scene {
  switch (formatOf(filePath)) {
    case 'obj':
      return loadObj(filePath, { triangulate: flags.triangulate, extensions: flags.extensions });
    case 'objbin':
      return loadObjbin(filePath, { extensions: flags.extensions });
  }
}

export function saveScene(filePath: string, scene: Scene, extensions: boolean): void {
  switch (formatOf(filePath)) {
    case 'obj':
      saveObj(filePath, scene, { extensions });
      break;
    case 'objbin':
      saveObjbin(filePath, scene, { extensions });
      break;
  }
}

/** The lines `info` prints for a scene */
export function describeScene(filePath: string, scene: Scene): string[] {
  const stats = sceneStats(scene);
  const elements = ELEMENT_NAMES.filter((name) => stats.elements[name] > 0).map(
    (name) => `${stats.elements[name]} ${name}`
  );
  return [
    `file: ${filePath}`,
    `shapes: ${stats.shapes}`,
    `vertices: ${stats.vertices}`,
    `elements: ${elements.length > 0 ? elements.join(', ') : 'none'}`,
    `materials: ${stats.materials}`,
    `textures: ${stats.textures}`,
    `cameras: ${stats.cameras}`,
    `environments: ${stats.environments}`,
  ];
}

function reportError(error: unknown): void {
  log.caught('command failed', error);
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('objkit')
    .description('Inspect and convert OBJ scenes and objkit binary dumps')
    .version('0.1.0');

  program
    .command('info')
    .description('Print a summary of a .obj or .objbin scene')
    .argument('<file>', 'Scene to inspect')
    .option('-t, --triangulate', 'Triangulate faces while loading', false)
    .option('-x, --extensions', 'Read camera, environment, color, radius and transform records', false)
    .action((file: string, options: LoadFlags) => {
      try {
        const scene = loadScene(file, options);
        for (const line of describeScene(file, scene)) {
          console.log(line);
        }
      } catch (error) {
        reportError(error);
      }
    });

  program
    .command('convert')
    .description('Convert between .obj and .objbin')
    .argument('<input>', 'Scene to read')
    .argument('<output>', 'Scene to write; the format follows the extension')
    .option('-t, --triangulate', 'Triangulate faces while loading', false)
    .option('-x, --extensions', 'Keep camera, environment, color, radius and transform data', false)
    .action((input: string, output: string, options: LoadFlags) => {
      try {
        const start = Date.now();
        const scene = loadScene(input, options);
        saveScene(output, scene, options.extensions);
        const elapsed = Date.now() - start;
        console.log(`Converted ${input} -> ${output} (${scene.shapes.length} shapes) in ${elapsed}ms`);
      } catch (error) {
        reportError(error);
      }
    });

  return program;
}
