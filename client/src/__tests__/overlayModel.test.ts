import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import * as THREE from 'three';

import { DEFAULT_CENTER, MAX_LATITUDE, validateAndLoadConfig } from '../config';
import { initModel, update } from '../overlay/model';
import type { OverlayModel } from '../overlay/model';
import { view } from '../overlay/view';
import type { LoadedTexture, Marker } from '../types';

// ── Test Helpers ───────────────────────────────────────────────────

const config = validateAndLoadConfig().config;

function markers(count: number): Marker[] {
  return Array.from({ length: count }, (_, i) => ({
    id: `m${i}`,
    position: { lat: 52 + i * 0.01, lng: 13 + i * 0.01 },
  }));
}

function loadedTexture(): LoadedTexture {
  return { texture: new THREE.Texture(), width: 48, height: 72 };
}

function loadedModel(markerCount: number): OverlayModel {
  const withMarkers = update(initModel(config), { type: 'markers_changed', markers: markers(markerCount) });
  return update(withMarkers, { type: 'texture_loaded', texture: loadedTexture() });
}

describe('initModel', () => {
  it('starts loading the configured texture with no mesh', () => {
    const model = initModel(config);
    expect(model.texture).toEqual({ status: 'loading', url: '/markers/pin.svg' });
    expect(model.mesh).toBeNull();
    expect(model.meshVersion).toBe(0);
    expect(model.markers).toEqual([]);
    expect(model.camera).toEqual({ center: DEFAULT_CENTER, zoom: 12 });
    expect(model.viewport).toEqual({ width: 800, height: 600 });
    expect(model.zoomRange).toEqual([0, 19]);
  });
});

describe('update', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('holds markers without building while the texture is loading', () => {
    const model = update(initModel(config), { type: 'markers_changed', markers: markers(3) });
    expect(model.markers).toHaveLength(3);
    expect(model.mesh).toBeNull();
    expect(model.meshVersion).toBe(0);
  });

  it('builds the mesh once when the texture loads', () => {
    const model = loadedModel(3);
    expect(model.texture.status).toBe('loaded');
    expect(model.meshVersion).toBe(1);
    expect(model.mesh?.vertices).toHaveLength(12);
    expect(model.mesh?.triangles).toHaveLength(6);
  });

  it('sizes quads from the texture and dpi', () => {
    const model = loadedModel(1);
    const offsets = model.mesh?.vertices.map((v) => v.offset);
    expect(offsets).toEqual([
      { x: -12, y: 0 },
      { x: 12, y: 0 },
      { x: 12, y: 36 },
      { x: -12, y: 36 },
    ]);
  });

  it('ignores a second texture completion', () => {
    const model = loadedModel(2);
    const again = update(model, { type: 'texture_loaded', texture: loadedTexture() });
    expect(again).toBe(model);
    expect(console.warn).toHaveBeenCalledWith('[Overlay]', 'Ignoring texture completion while loaded');
  });

  it('never builds after a failed load', () => {
    const error = new Error('offline');
    let model = update(initModel(config), { type: 'texture_failed', error });
    expect(model.texture).toEqual({ status: 'failed', url: '/markers/pin.svg', error });

    model = update(model, { type: 'markers_changed', markers: markers(4) });
    expect(model.mesh).toBeNull();
    expect(model.meshVersion).toBe(0);

    const late = update(model, { type: 'texture_loaded', texture: loadedTexture() });
    expect(late).toBe(model);
  });

  it('ignores a failure reported after a successful load', () => {
    const model = loadedModel(1);
    expect(update(model, { type: 'texture_failed', error: new Error('late') })).toBe(model);
  });

  it('rebuilds wholesale on marker-set change once loaded', () => {
    const model = loadedModel(2);
    const next = update(model, { type: 'markers_changed', markers: markers(5) });
    expect(next.meshVersion).toBe(2);
    expect(next.mesh).not.toBe(model.mesh);
    expect(next.mesh?.triangles).toHaveLength(10);
  });

  it('rebuilds to an empty mesh when all markers go away', () => {
    const next = update(loadedModel(2), { type: 'markers_changed', markers: [] });
    expect(next.mesh?.vertices).toEqual([]);
    expect(next.mesh?.triangles).toEqual([]);
  });

  it('clamps camera zoom and latitude without rebuilding', () => {
    const model = loadedModel(1);
    const moved = update(model, {
      type: 'camera_moved',
      camera: { center: { lat: 89, lng: 200 }, zoom: 25 },
    });
    expect(moved.camera).toEqual({ center: { lat: MAX_LATITUDE, lng: -160 }, zoom: 19 });
    expect(moved.mesh).toBe(model.mesh);
    expect(moved.meshVersion).toBe(model.meshVersion);

    const out = update(moved, { type: 'camera_moved', camera: { center: DEFAULT_CENTER, zoom: -3 } });
    expect(out.camera.zoom).toBe(0);
  });

  it('replaces the viewport', () => {
    const model = update(initModel(config), { type: 'viewport_resized', viewport: { width: 1024, height: 768 } });
    expect(model.viewport).toEqual({ width: 1024, height: 768 });
  });
});

describe('view', () => {
  it('draws nothing while loading', () => {
    expect(view(initModel(config))).toBeNull();
  });

  it('draws nothing after a failure', () => {
    const failed = update(initModel(config), { type: 'texture_failed', error: new Error('x') });
    expect(view(failed)).toBeNull();
  });

  it('hands mesh, texture and uniforms to the draw call', () => {
    const model = loadedModel(2);
    const drawCall = view(model);
    expect(drawCall).not.toBeNull();
    if (!drawCall || model.texture.status !== 'loaded') throw new Error('expected a draw call');

    expect(drawCall.mesh).toBe(model.mesh);
    expect(drawCall.meshVersion).toBe(1);
    expect(drawCall.origin).toEqual(model.mesh?.vertices[0]?.position);
    expect(drawCall.texture).toBe(model.texture.texture);
    expect(drawCall.uniforms.uAspect).toBe(800 / 600);
    expect(drawCall.uniforms.uZoom).toBe(4096);
    expect(drawCall.uniforms.uViewportHeight).toBe(600);
  });
});
