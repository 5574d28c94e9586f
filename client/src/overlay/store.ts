/**
 * OverlayStore: holds the current OverlayModel and runs messages through
 * `update`, announcing what changed on a typed event bus.
 */

import type { ClientRuntimeConfig } from '../config';
import { EventBus } from '../core/eventBus';
import type { OverlayEventMap } from '../core/eventBus';
import { createLogger } from '../core/logger';
import type { LoadedTexture, Result } from '../types';
import type { OverlayModel, OverlayMsg } from './model';
import { initModel, update } from './model';

const log = createLogger('OverlayStore');

export class OverlayStore {
  readonly events = new EventBus<OverlayEventMap>();
  private current: OverlayModel;

  constructor(config: ClientRuntimeConfig) {
    this.current = initModel(config);
  }

  get model(): OverlayModel {
    return this.current;
  }

  dispatch(msg: OverlayMsg): void {
    const prev = this.current;
    const next = update(prev, msg);
    if (next === prev) return;
    this.current = next;

    if (next.texture !== prev.texture) {
      this.events.emit('texture_state', next.texture);
      if (next.texture.status === 'failed') {
        this.events.emit('texture_failed', { url: next.texture.url, error: next.texture.error });
      }
    }

    if (next.meshVersion !== prev.meshVersion && next.mesh) {
      const triangles = next.mesh.triangles.length;
      log.debug(`Mesh v${next.meshVersion}: ${next.markers.length} markers, ${triangles} triangles`);
      this.events.emit('mesh_rebuilt', {
        meshVersion: next.meshVersion,
        triangles,
        markers: next.markers.length,
      });
    }

    if (next.camera !== prev.camera) {
      this.events.emit('camera_moved', next.camera);
    }

    this.events.emit('model_changed', { meshVersion: next.meshVersion });
  }

  /** Feed the single texture-load outcome into the model. */
  completeTextureLoad(result: Result<LoadedTexture, Error>): void {
    if (result.ok) {
      this.dispatch({ type: 'texture_loaded', texture: result.value });
    } else {
      this.dispatch({ type: 'texture_failed', error: result.error });
    }
  }
}
