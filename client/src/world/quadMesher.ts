/**
 * Quad mesher: turns a flat vertex list, grouped in runs of four, into an
 * indexed triangle mesh.
 *
 * Each run is expected in (bottom-left, bottom-right, top-right, top-left)
 * order. Quad i at offset o = 4i is split along the o+1 / o+3 diagonal:
 *
 *   A: (o+3, o+1, o)
 *   B: (o+2, o+1, o+3)
 *
 * Trailing vertices that do not fill a whole quad are kept in the vertex
 * list but referenced by no triangle.
 *
 * No THREE.js dependency -- pure data in, pure data out.
 */

import { createLogger } from '../core/logger';
import type { Mesh, Triangle } from '../types';

const log = createLogger('QuadMesher');

export const VERTICES_PER_QUAD = 4;
export const TRIANGLES_PER_QUAD = 2;

export function buildMesh<T>(vertices: readonly T[]): Mesh<T> {
  const quadCount = Math.floor(vertices.length / VERTICES_PER_QUAD);
  const leftover = vertices.length - quadCount * VERTICES_PER_QUAD;
  if (leftover > 0) {
    log.warn(`Dropping ${leftover} trailing vertices (count ${vertices.length} is not a multiple of 4)`);
  }

  const triangles = new Array<Triangle>(quadCount * TRIANGLES_PER_QUAD);
  for (let i = 0; i < quadCount; i++) {
    const o = i * VERTICES_PER_QUAD;
    const t = i * TRIANGLES_PER_QUAD;
    triangles[t] = [o + 3, o + 1, o];
    triangles[t + 1] = [o + 2, o + 1, o + 3];
  }

  return Object.freeze({
    vertices: Object.freeze([...vertices]),
    triangles: Object.freeze(triangles),
  });
}

/** Flatten the triangle list into a GPU index buffer. */
export function meshIndices<T>(mesh: Mesh<T>): Uint32Array {
  const indices = new Uint32Array(mesh.triangles.length * 3);
  let i = 0;
  for (const [a, b, c] of mesh.triangles) {
    indices[i++] = a;
    indices[i++] = b;
    indices[i++] = c;
  }
  return indices;
}
