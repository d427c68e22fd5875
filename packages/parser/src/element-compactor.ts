/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Element compactor - turns run-length encoded polygons and polylines into
 * fixed-stride primitives when every run has the same small size.
 *
 * Input for variable types is a sequence of [count, id0..id(count-1)] runs.
 */

import { ElementType, FormatError, elementStride, isVariableElementType } from '@objkit/data';

export interface CompactedElements {
  elementType: ElementType;
  elementCount: number;
  elements: Int32Array;
}

/**
 * Fixed element type for runs that all have `length` vertices, or null when
 * the runs have to stay run-length encoded.
 * Polylines only collapse to points and lines; a three-vertex polyline is
 * not a triangle.
 */
function fixedTypeForRuns(type: ElementType, length: number): ElementType | null {
  switch (length) {
    case 1:
      return ElementType.Point;
    case 2:
      return ElementType.Line;
    case 3:
      return type === ElementType.Polygon ? ElementType.Triangle : null;
    default:
      return null;
  }
}

export function compactElements(
  type: ElementType,
  buffer: ArrayLike<number>,
  source?: string
): CompactedElements {
  if (!isVariableElementType(type)) {
    const stride = elementStride(type);
    if (buffer.length % stride !== 0) {
      throw new FormatError(
        `element buffer of length ${buffer.length} is not a multiple of stride ${stride}`,
        source
      );
    }
    return {
      elementType: type,
      elementCount: buffer.length / stride,
      elements: Int32Array.from(buffer),
    };
  }

  // Single pass over the runs for count and min/max length
  let runCount = 0;
  let minLength = Infinity;
  let maxLength = 0;
  for (let pos = 0; pos < buffer.length; ) {
    const length = buffer[pos];
    if (length <= 0) {
      throw new FormatError(`element run ${runCount} has length ${length}`, source);
    }
    if (pos + 1 + length > buffer.length) {
      throw new FormatError(`element run ${runCount} overruns the element buffer`, source);
    }
    if (length < minLength) minLength = length;
    if (length > maxLength) maxLength = length;
    pos += length + 1;
    runCount++;
  }

  const fixedType = runCount > 0 && minLength === maxLength ? fixedTypeForRuns(type, maxLength) : null;
  if (fixedType === null) {
    return {
      elementType: type,
      elementCount: runCount,
      elements: Int32Array.from(buffer),
    };
  }

  const stride = maxLength;
  const elements = new Int32Array(runCount * stride);
  for (let e = 0; e < runCount; e++) {
    const runStart = e * (stride + 1) + 1;
    for (let i = 0; i < stride; i++) {
      elements[e * stride + i] = buffer[runStart + i];
    }
  }

  return { elementType: fixedType, elementCount: runCount, elements };
}
