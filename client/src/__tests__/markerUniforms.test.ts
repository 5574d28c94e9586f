import { describe, it, expect } from 'vitest';
import * as THREE from 'three';

import { MAX_ZOOM } from '../config';
import { lngLatToWorld, zoomScale } from '../core/mercator';
import { meshToGeometry } from '../rendering/markerLayer';
import { computeMarkerUniforms, meshOrigin } from '../rendering/markerUniforms';
import type { MarkerUniformValues } from '../rendering/markerUniforms';
import type { MapCamera, Vec2 } from '../types';
import { markerVertices } from '../world/markerQuads';
import { buildMesh } from '../world/quadMesher';
import { SAMPLE_MARKERS } from '../world/sampleMarkers';

const camera: MapCamera = { center: { lat: 0, lng: 0 }, zoom: 2 };
const viewport = { width: 400, height: 200 };
const worldOrigin: Vec2 = { x: 0, y: 0 };

function project(world: Vec2, cam: MapCamera, origin: Vec2 = worldOrigin): THREE.Vector3 {
  const u = computeMarkerUniforms(cam, viewport, origin);
  return new THREE.Vector3((world.x - origin.x) * u.uZoom, (world.y - origin.y) * u.uZoom, 0).applyMatrix4(u.uView);
}

/** Anchor placement as the vertex shader computes it, every step rounded to fp32. */
function gpuAnchor(relative: Vec2, u: MarkerUniformValues): Vec2 {
  const f = Math.fround;
  const e = u.uView.elements;
  const px = f(f(relative.x) * f(u.uZoom));
  const py = f(f(relative.y) * f(u.uZoom));
  return {
    x: f(f(f(e[0] ?? 0) * px) + f(e[12] ?? 0)),
    y: f(f(f(e[5] ?? 0) * py) + f(e[13] ?? 0)),
  };
}

describe('computeMarkerUniforms', () => {
  it('derives scalars from camera and viewport', () => {
    const u = computeMarkerUniforms(camera, viewport, worldOrigin);
    expect(u.uAspect).toBe(2);
    expect(u.uZoom).toBe(4);
    expect(u.uViewportHeight).toBe(200);
  });

  it('maps the camera centre to the clip-space origin', () => {
    const berlin: MapCamera = { center: { lat: 52.52, lng: 13.405 }, zoom: 11.5 };
    const clip = project(lngLatToWorld(berlin.center), berlin);
    expect(clip.x).toBeCloseTo(0, 6);
    expect(clip.y).toBeCloseTo(0, 6);
  });

  it('reaches the right clip edge half a viewport east of centre', () => {
    // 200 screen px = 200 / 4 world px at zoom 2
    const clip = project({ x: 128 + 50, y: 128 }, camera);
    expect(clip.x).toBeCloseTo(1, 10);
    expect(clip.y).toBeCloseTo(0, 10);
  });

  it('flips y so north is up', () => {
    // 100 screen px north = 25 world px
    const clip = project({ x: 128, y: 128 - 25 }, camera);
    expect(clip.y).toBeCloseTo(1, 10);
  });

  it('places points the same way whatever the origin', () => {
    const point = { x: 128 + 50, y: 128 - 25 };
    const shifted = project(point, camera, { x: 170, y: 90 });
    expect(shifted.x).toBeCloseTo(1, 10);
    expect(shifted.y).toBeCloseTo(1, 10);
  });

  it('scales with zoom', () => {
    const near = computeMarkerUniforms({ ...camera, zoom: 5 }, viewport, worldOrigin);
    expect(near.uZoom).toBe(zoomScale(5));
  });

  it('keeps fp32 anchors within a small fraction of a pixel at the deepest zoom', () => {
    const style = { width: 24, height: 36, anchor: { x: 0.5, y: 0 } };
    const mesh = buildMesh(markerVertices(SAMPLE_MARKERS, style));
    const origin = meshOrigin(mesh);
    const position = meshToGeometry(mesh, origin).getAttribute('position');
    const deep: MapCamera = { center: { lat: 52.5166, lng: 13.3781 }, zoom: MAX_ZOOM };
    const screen = { width: 800, height: 600 };
    const u = computeMarkerUniforms(deep, screen, origin);
    const center = lngLatToWorld(deep.center);

    let worst = 0;
    mesh.vertices.forEach((vertex, i) => {
      const clip = gpuAnchor({ x: position.getX(i), y: position.getY(i) }, u);
      const expectedX = (vertex.position.x - center.x) * u.uZoom;
      const expectedY = -(vertex.position.y - center.y) * u.uZoom;
      worst = Math.max(
        worst,
        Math.abs(clip.x * (screen.width / 2) - expectedX),
        Math.abs(clip.y * (screen.height / 2) - expectedY),
      );
    });

    expect(worst).toBeLessThan(0.05);
  });
});

describe('meshOrigin', () => {
  it('takes the first vertex anchor', () => {
    const mesh = buildMesh(markerVertices(SAMPLE_MARKERS, { width: 1, height: 1, anchor: { x: 0, y: 0 } }));
    expect(meshOrigin(mesh)).toEqual(mesh.vertices[0]?.position);
  });

  it('falls back to the world origin for an empty mesh', () => {
    expect(meshOrigin(buildMesh([]))).toEqual({ x: 0, y: 0 });
  });
});
