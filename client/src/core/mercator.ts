/**
 * Web Mercator projection between geographic coordinates and world pixels.
 *
 * World pixels are measured on a TILE_SIZE x TILE_SIZE square at zoom 0,
 * origin at the north-west corner, y growing southwards.
 */

import { MAX_LATITUDE, TILE_SIZE } from '../config';
import type { LatLng, Vec2 } from '../types';
import { clamp } from './math';

export function clampLatitude(lat: number): number {
  return clamp(lat, -MAX_LATITUDE, MAX_LATITUDE);
}

export function lngLatToWorld(pos: LatLng): Vec2 {
  const phi = (clampLatitude(pos.lat) * Math.PI) / 180;
  const x = ((pos.lng + 180) / 360) * TILE_SIZE;
  const y = ((1 - Math.log(Math.tan(phi) + 1 / Math.cos(phi)) / Math.PI) / 2) * TILE_SIZE;
  return { x, y };
}

export function worldToLngLat(world: Vec2): LatLng {
  const lng = (world.x / TILE_SIZE) * 360 - 180;
  const n = Math.PI * (1 - (2 * world.y) / TILE_SIZE);
  const lat = (Math.atan(Math.sinh(n)) * 180) / Math.PI;
  return { lat, lng };
}

/** Pixels per world pixel at a (possibly fractional) zoom level. */
export function zoomScale(zoom: number): number {
  return Math.pow(2, zoom);
}
