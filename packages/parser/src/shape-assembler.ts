/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Shape assembler - accumulates element records into the pending shape and
 * flushes it into the scene whenever the name, group, material or element
 * kind changes.
 */

import {
  ElementType,
  createCamera,
  createEnvironment,
  createLogger,
  findMaterialIndex,
  identityAffine3,
  isIdentityAffine3,
  vec3,
  type Affine3,
  type Scene,
  type Shape,
} from '@objkit/data';
import { Attribute, ATTRIBUTE_COUNT, AttributePools } from './attribute-pools.js';
import { compactElements } from './element-compactor.js';
import { ABSENT, VertexTable, parseVertexReference, type AttributeReference } from './vertex-table.js';
import { formatError, type RecordContext } from './values.js';

const log = createLogger('Parser');

export interface ShapeAssemblerOptions {
  /** Fan-triangulate faces and split polylines into segments as they are read */
  triangulate: boolean;
  /** Accept color/radius vertex components and camera/environment records */
  extensions: boolean;
  /** File name used in error messages */
  source?: string;
}

/**
 * Everything that belongs to the shape being built. Reset by every flush,
 * except the naming state which only the boundary records change.
 */
interface PendingShape {
  name: string;
  materialName: string;
  groupName: string;
  transform: Affine3;
  elementType: ElementType | null;
  elements: number[];
  /** Per-attribute vertex data, indexed by Attribute */
  vertexData: number[][];
  /** Which attributes the first vertex used; every later vertex must match */
  layout: boolean[] | null;
}

function createPendingShape(): PendingShape {
  return {
    name: '',
    materialName: '',
    groupName: '',
    transform: identityAffine3(),
    elementType: null,
    elements: [],
    vertexData: [[], [], [], [], []],
    layout: null,
  };
}

export class ShapeAssembler {
  readonly pools = new AttributePools();
  private readonly vertices = new VertexTable();
  private readonly pending: PendingShape = createPendingShape();

  constructor(
    private readonly scene: Scene,
    private readonly options: ShapeAssemblerOptions
  ) {}

  /** `o` - new object: clears material, group and transform */
  beginObject(name: string): void {
    this.flush();
    this.pending.name = name;
    this.pending.materialName = '';
    this.pending.groupName = '';
    this.pending.transform = identityAffine3();
  }

  /** `g` */
  beginGroup(name: string): void {
    this.flush();
    this.pending.groupName = name;
  }

  /** `usemtl` */
  useMaterial(name: string): void {
    this.flush();
    this.pending.materialName = name;
  }

  /** `xf` - applies to the shapes flushed from now on */
  setTransform(transform: Affine3): void {
    this.pending.transform = transform;
  }

  /** `p v...` */
  addPoints(tokens: readonly string[], ctx: RecordContext): void {
    this.requireVertices(tokens, 1, ctx);
    this.beginElements(ElementType.Point);
    for (let t = 1; t < tokens.length; t++) {
      this.pending.elements.push(this.addVertex(tokens[t], ctx));
    }
  }

  /** `l v...` */
  addLine(tokens: readonly string[], ctx: RecordContext): void {
    this.requireVertices(tokens, 2, ctx);

    if (!this.options.triangulate) {
      this.beginElements(ElementType.Polyline);
      const elements = this.pending.elements;
      elements.push(tokens.length - 1);
      for (let t = 1; t < tokens.length; t++) {
        elements.push(this.addVertex(tokens[t], ctx));
      }
      return;
    }

    this.beginElements(ElementType.Line);
    const elements = this.pending.elements;
    for (let t = 1; t < tokens.length; t++) {
      const id = this.addVertex(tokens[t], ctx);
      if (t > 2) {
        // Repeat the previous vertex to start the next segment
        elements.push(elements[elements.length - 1]);
      }
      elements.push(id);
    }
  }

  /** `f v...` */
  addFace(tokens: readonly string[], ctx: RecordContext): void {
    this.requireVertices(tokens, 3, ctx);

    if (!this.options.triangulate) {
      this.beginElements(ElementType.Polygon);
      const elements = this.pending.elements;
      elements.push(tokens.length - 1);
      for (let t = 1; t < tokens.length; t++) {
        elements.push(this.addVertex(tokens[t], ctx));
      }
      return;
    }

    this.beginElements(ElementType.Triangle);
    const elements = this.pending.elements;
    let first = 0;
    for (let t = 1; t < tokens.length; t++) {
      const id = this.addVertex(tokens[t], ctx);
      if (t === 1) first = id;
      if (t > 3) {
        // Fan around the first vertex: (first, previous, current)
        const previous = elements[elements.length - 1];
        elements.push(first, previous);
      }
      elements.push(id);
    }
  }

  /** `c from to` */
  addCamera(tokens: readonly string[], ctx: RecordContext): void {
    this.requireVertices(tokens, 2, ctx);
    this.flush();
    const [from, to] = this.resolveLookAt(tokens, ctx);
    const pools = this.pools;

    const camera = createCamera(this.pending.name);
    camera.from = pools.readVec3(Attribute.Position, from[Attribute.Position]);
    camera.to = pools.readVec3(Attribute.Position, to[Attribute.Position]);
    camera.up = from[Attribute.Normal] !== ABSENT ? pools.readVec3(Attribute.Normal, from[Attribute.Normal]) : vec3(0, 1, 0);
    if (to[Attribute.Texcoord] !== ABSENT) {
      const size = pools.readVec2(Attribute.Texcoord, to[Attribute.Texcoord]);
      camera.width = size.x;
      camera.height = size.y;
    }
    if (from[Attribute.Texcoord] !== ABSENT) {
      camera.aperture = pools.readVec2(Attribute.Texcoord, from[Attribute.Texcoord]).x;
    }
    this.scene.cameras.push(camera);
    this.endLookAt();
  }

  /** `e from to` */
  addEnvironment(tokens: readonly string[], ctx: RecordContext): void {
    this.requireVertices(tokens, 2, ctx);
    this.flush();
    const [from, to] = this.resolveLookAt(tokens, ctx);
    const pools = this.pools;

    const environment = createEnvironment(this.pending.name);
    environment.materialName = this.pending.materialName;
    environment.materialIndex = findMaterialIndex(this.scene.materials, environment.materialName);
    environment.from = pools.readVec3(Attribute.Position, from[Attribute.Position]);
    environment.to = pools.readVec3(Attribute.Position, to[Attribute.Position]);
    environment.up = from[Attribute.Normal] !== ABSENT ? pools.readVec3(Attribute.Normal, from[Attribute.Normal]) : vec3(0, 1, 0);
    this.scene.environments.push(environment);
    this.endLookAt();
  }

  /**
   * Emit the pending shape, if it has any elements, and reset the vertex
   * scope. Naming state is kept.
   */
  flush(): void {
    const pending = this.pending;
    if (pending.elements.length === 0 || pending.elementType === null) return;

    const compacted = compactElements(pending.elementType, pending.elements, this.options.source);
    const data = pending.vertexData;
    const shape: Shape = {
      name: pending.name,
      groupName: pending.groupName,
      materialName: pending.materialName,
      materialIndex: findMaterialIndex(this.scene.materials, pending.materialName),
      elementType: compacted.elementType,
      elementCount: compacted.elementCount,
      elements: compacted.elements,
      vertexCount: this.vertices.size,
      positions: Float32Array.from(data[Attribute.Position]),
      normals: Float32Array.from(data[Attribute.Normal]),
      texcoords: Float32Array.from(data[Attribute.Texcoord]),
      colors: Float32Array.from(data[Attribute.Color]),
      radius: Float32Array.from(data[Attribute.Radius]),
      transformed: !isIdentityAffine3(pending.transform),
      transform: Float32Array.from(pending.transform),
    };
    this.scene.shapes.push(shape);

    log.debug(`shape '${shape.name}'`, {
      group: shape.groupName,
      material: shape.materialName,
      vertices: shape.vertexCount,
      elements: shape.elementCount,
      elementType: shape.elementType,
    });

    this.vertices.clear();
    pending.elementType = null;
    pending.elements = [];
    pending.vertexData = [[], [], [], [], []];
    pending.layout = null;
  }

  private requireVertices(tokens: readonly string[], min: number, ctx: RecordContext): void {
    if (tokens.length - 1 < min) {
      throw formatError(`'${tokens[0]}' needs at least ${min} vertices, got ${tokens.length - 1}`, ctx);
    }
  }

  /** Flush first when the record switches element kind */
  private beginElements(type: ElementType): void {
    if (this.pending.elementType !== type) {
      this.flush();
      this.pending.elementType = type;
    }
  }

  /**
   * Resolve a vertex token to its local id, copying its attributes into the
   * pending vertex data the first time the tuple is seen.
   */
  private addVertex(token: string, ctx: RecordContext): number {
    const reference = parseVertexReference(token, this.pools, this.options.extensions, ctx);
    const resolved = this.vertices.resolve(reference);
    if (!resolved.isNew) return resolved.localId;

    this.checkLayout(reference, token, ctx);
    for (let attribute = 0; attribute < ATTRIBUTE_COUNT; attribute++) {
      const index = reference[attribute];
      if (index !== ABSENT) {
        this.pools.copyTo(attribute, index, this.pending.vertexData[attribute]);
      }
    }
    return resolved.localId;
  }

  private checkLayout(reference: AttributeReference, token: string, ctx: RecordContext): void {
    const layout = reference.map((index) => index !== ABSENT);
    const expected = this.pending.layout;
    if (expected === null) {
      this.pending.layout = layout;
      return;
    }
    for (let attribute = 0; attribute < ATTRIBUTE_COUNT; attribute++) {
      if (expected[attribute] !== layout[attribute]) {
        throw formatError(
          `vertex '${token}' does not use the same attributes as the rest of its shape`,
          ctx
        );
      }
    }
  }

  /** Cameras and environments resolve their two vertices in a scope of their own */
  private resolveLookAt(tokens: readonly string[], ctx: RecordContext): [AttributeReference, AttributeReference] {
    const extensions = this.options.extensions;
    const from = this.vertices.resolve(parseVertexReference(tokens[1], this.pools, extensions, ctx)).reference;
    const to = this.vertices.resolve(parseVertexReference(tokens[2], this.pools, extensions, ctx)).reference;
    return [from, to];
  }

  private endLookAt(): void {
    this.vertices.clear();
    this.pending.name = '';
    this.pending.materialName = '';
    this.pending.transform = identityAffine3();
  }
}
