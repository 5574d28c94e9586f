/**
 * Typed event bus for overlay events.
 * Zero-dependency pub/sub with type safety.
 */

import type { MapCamera, TextureState } from '../types';

type Listener<T> = (payload: T) => void;

export class EventBus<EventMap extends { [K in keyof EventMap]: unknown }> {
  private listeners = new Map<keyof EventMap, Set<Listener<never>>>();

  on<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    const registered = set;
    registered.add(listener);

    // Return unsubscribe function
    return () => {
      registered.delete(listener);
      if (registered.size === 0 && this.listeners.get(event) === registered) {
        this.listeners.delete(event);
      }
    };
  }

  once<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    const unsub = this.on(event, (payload) => {
      unsub();
      listener(payload);
    });
    return unsub;
  }

  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const set = this.listeners.get(event);
    if (!set) return;
    for (const listener of [...set]) {
      (listener as Listener<EventMap[K]>)(payload);
    }
  }

  off<K extends keyof EventMap>(event: K): void {
    this.listeners.delete(event);
  }

  clear(): void {
    this.listeners.clear();
  }
}

// ── Overlay Event Map ───────────────────────────────────────────

export interface OverlayEventMap {
  model_changed: { meshVersion: number };
  mesh_rebuilt: { meshVersion: number; triangles: number; markers: number };
  texture_state: TextureState;
  texture_failed: { url: string; error: Error };
  camera_moved: MapCamera;
}
