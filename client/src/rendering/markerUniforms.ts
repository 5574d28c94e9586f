/**
 * Camera + viewport → uniform values for the marker program.
 *
 * Positions reach the GPU relative to a mesh origin so fp32 only ever sees
 * small numbers; the origin-to-camera translation is folded into uView in
 * float64.
 */

import * as THREE from 'three';
import { lngLatToWorld, zoomScale } from '../core/mercator';
import type { MapCamera, MarkerVertex, Mesh, Vec2, Viewport } from '../types';

export interface MarkerUniformValues {
  /** (position − origin) · uZoom → clip space. */
  uView: THREE.Matrix4;
  uAspect: number;
  uZoom: number;
  uViewportHeight: number;
}

/** Anchor of the first vertex, or the world origin for an empty mesh. */
export function meshOrigin(mesh: Mesh<MarkerVertex>): Vec2 {
  const first = mesh.vertices[0];
  return first ? { x: first.position.x, y: first.position.y } : { x: 0, y: 0 };
}

export function computeMarkerUniforms(camera: MapCamera, viewport: Viewport, origin: Vec2): MarkerUniformValues {
  const scale = zoomScale(camera.zoom);
  const center = lngLatToWorld(camera.center);
  const sx = 2 / viewport.width;
  const sy = 2 / viewport.height;
  const tx = (origin.x - center.x) * scale * sx;
  const ty = -(origin.y - center.y) * scale * sy;

  // y flips: world pixels grow southwards, clip space grows upwards
  const uView = new THREE.Matrix4().set(
    sx, 0, 0, tx,
    0, -sy, 0, ty,
    0, 0, 1, 0,
    0, 0, 0, 1,
  );

  return {
    uView,
    uAspect: viewport.width / viewport.height,
    uZoom: scale,
    uViewportHeight: viewport.height,
  };
}
