import type * as THREE from 'three';
import type { MarkerUniformValues } from '../rendering/markerUniforms';
import { computeMarkerUniforms, meshOrigin } from '../rendering/markerUniforms';
import type { MarkerVertex, Mesh, Vec2 } from '../types';
import type { OverlayModel } from './model';

/** Everything one marker draw needs: geometry, texture and uniforms. */
export interface MarkerDrawCall {
  mesh: Mesh<MarkerVertex>;
  meshVersion: number;
  /** World point the uploaded positions are relative to. */
  origin: Vec2;
  texture: THREE.Texture;
  uniforms: MarkerUniformValues;
}

/** Null until the icon texture has loaded and a mesh exists. */
export function view(model: OverlayModel): MarkerDrawCall | null {
  if (model.texture.status !== 'loaded' || model.mesh === null) return null;
  const origin = meshOrigin(model.mesh);
  return {
    mesh: model.mesh,
    meshVersion: model.meshVersion,
    origin,
    texture: model.texture.texture,
    uniforms: computeMarkerUniforms(model.camera, model.viewport, origin),
  };
}
