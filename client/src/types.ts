/**
 * Core type definitions for the marker overlay.
 */

import type * as THREE from 'three';

// ── Geometry ────────────────────────────────────────────────────

export interface Vec2 {
  x: number;
  y: number;
}

export interface LatLng {
  lat: number;
  lng: number;
}

/** Ordered triple of vertex indices. Winding is significant. */
export type Triangle = readonly [number, number, number];

/** Immutable (vertices, triangles) pair consumed by a draw call. */
export interface Mesh<T> {
  readonly vertices: readonly T[];
  readonly triangles: readonly Triangle[];
}

// ── Markers ─────────────────────────────────────────────────────

export interface MarkerVertex {
  /** Anchor in world pixels at zoom 0 (y down). */
  position: Vec2;
  /** Corner displacement from the anchor in CSS pixels (y up). */
  offset: Vec2;
  texCoord: Vec2;
}

export interface MarkerStyle {
  width: number;
  height: number;
  /** Fraction of the icon, from its bottom-left, that sits on the coordinate. */
  anchor: Vec2;
}

export interface Marker {
  id: string;
  position: LatLng;
  style?: MarkerStyle;
}

// ── Camera ──────────────────────────────────────────────────────

export interface MapCamera {
  center: LatLng;
  zoom: number;
}

export interface Viewport {
  width: number;
  height: number;
}

// ── Texture ─────────────────────────────────────────────────────

export interface LoadedTexture {
  texture: THREE.Texture;
  width: number;
  height: number;
}

export type TextureState =
  | { status: 'loading'; url: string }
  | ({ status: 'loaded'; url: string } & LoadedTexture)
  | { status: 'failed'; url: string; error: Error };

// ── Result Type ─────────────────────────────────────────────────

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T, E = Error>(value: T): Result<T, E> {
  return { ok: true, value };
}

export function err<T, E = Error>(error: E): Result<T, E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  const { error } = result;
  throw error instanceof Error ? error : new Error(String(error));
}
