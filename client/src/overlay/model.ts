/**
 * Marker overlay model and its pure update function.
 *
 * The mesh is rebuilt wholesale exactly when there is something new to
 * draw: once when the icon texture finishes loading, and again on every
 * marker-set change after that. A failed load leaves the mesh null for the
 * life of the model.
 */

import type { ClientRuntimeConfig } from '../config';
import { createLogger } from '../core/logger';
import { clampLatitude } from '../core/mercator';
import { clamp, wrapLongitude } from '../core/math';
import type {
  LoadedTexture,
  MapCamera,
  Marker,
  MarkerVertex,
  Mesh,
  TextureState,
  Viewport,
} from '../types';
import { markerStyleFromTexture, markerVertices } from '../world/markerQuads';
import { buildMesh } from '../world/quadMesher';

const log = createLogger('Overlay');

export interface OverlayModel {
  readonly markers: readonly Marker[];
  readonly texture: TextureState;
  readonly camera: MapCamera;
  readonly viewport: Viewport;
  readonly mesh: Mesh<MarkerVertex> | null;
  /** Bumped on every mesh rebuild so renderers can skip re-uploads. */
  readonly meshVersion: number;
  readonly zoomRange: readonly [number, number];
  readonly textureDpi: number;
}

export type OverlayMsg =
  | { type: 'texture_loaded'; texture: LoadedTexture }
  | { type: 'texture_failed'; error: Error }
  | { type: 'markers_changed'; markers: readonly Marker[] }
  | { type: 'camera_moved'; camera: MapCamera }
  | { type: 'viewport_resized'; viewport: Viewport };

export function initModel(config: ClientRuntimeConfig): OverlayModel {
  return {
    markers: [],
    texture: { status: 'loading', url: config.markerTextureUrl },
    camera: { center: config.initialCenter, zoom: config.initialZoom },
    viewport: { width: config.viewportWidth, height: config.viewportHeight },
    mesh: null,
    meshVersion: 0,
    zoomRange: [config.minZoom, config.maxZoom],
    textureDpi: config.textureDpi,
  };
}

function rebuild(model: OverlayModel, texture: LoadedTexture, markers: readonly Marker[]): OverlayModel {
  const style = markerStyleFromTexture(texture.width, texture.height, model.textureDpi);
  const mesh = buildMesh(markerVertices(markers, style));
  return { ...model, markers, mesh, meshVersion: model.meshVersion + 1 };
}

export function update(model: OverlayModel, msg: OverlayMsg): OverlayModel {
  switch (msg.type) {
    case 'texture_loaded': {
      if (model.texture.status !== 'loading') {
        log.warn(`Ignoring texture completion while ${model.texture.status}`);
        return model;
      }
      const loaded: TextureState = { status: 'loaded', url: model.texture.url, ...msg.texture };
      return rebuild({ ...model, texture: loaded }, msg.texture, model.markers);
    }

    case 'texture_failed': {
      if (model.texture.status !== 'loading') {
        log.warn(`Ignoring texture failure while ${model.texture.status}`);
        return model;
      }
      return { ...model, texture: { status: 'failed', url: model.texture.url, error: msg.error } };
    }

    case 'markers_changed': {
      const { texture } = model;
      if (texture.status === 'loaded') {
        return rebuild(model, texture, msg.markers);
      }
      return { ...model, markers: msg.markers };
    }

    case 'camera_moved': {
      const [minZoom, maxZoom] = model.zoomRange;
      const camera: MapCamera = {
        center: {
          lat: clampLatitude(msg.camera.center.lat),
          lng: wrapLongitude(msg.camera.center.lng),
        },
        zoom: clamp(msg.camera.zoom, minZoom, maxZoom),
      };
      return { ...model, camera };
    }

    case 'viewport_resized':
      return { ...model, viewport: msg.viewport };
  }
}
