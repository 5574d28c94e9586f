/**
 * Global constants for the marker overlay.
 * All magic numbers live here, nowhere else.
 */

import type { LogLevel } from './core/logger';
import { isLogLevel } from './core/logger';
import type { LatLng, Vec2 } from './types';

// ── Projection ──────────────────────────────────────────────────
export const APP_NAME = 'Marker Overlay';
export const TILE_SIZE = 256;
export const MAX_LATITUDE = 85.0511287798066;

// ── Camera ──────────────────────────────────────────────────────
export const MIN_ZOOM = 0;
export const MAX_ZOOM = 19;
export const DEFAULT_ZOOM = 12;
export const DEFAULT_CENTER: LatLng = { lat: 52.52, lng: 13.405 };
export const WHEEL_ZOOM_RATE = 0.002;

// ── Viewport ────────────────────────────────────────────────────
export const DEFAULT_VIEWPORT_WIDTH = 800;
export const DEFAULT_VIEWPORT_HEIGHT = 600;
export const MAX_PIXEL_RATIO = 2;
export const BACKGROUND_COLOR = 0xe8e4dc;

// ── Markers ─────────────────────────────────────────────────────
export const MARKER_TEXTURE_URL = '/markers/pin.svg';
export const MARKER_TEXTURE_DPI = 2; // icon artwork is authored at 2x
export const DEFAULT_MARKER_ANCHOR: Vec2 = { x: 0.5, y: 0 }; // pin tip at bottom-centre
export const ALPHA_DISCARD_THRESHOLD = 0.01;

// ── Client Runtime Config Loading ──────────────────────────────
export interface ClientRuntimeConfig {
  appName: string;
  minZoom: number;
  maxZoom: number;
  initialZoom: number;
  initialCenter: LatLng;
  viewportWidth: number;
  viewportHeight: number;
  markerTextureUrl: string;
  textureDpi: number;
  logLevel: LogLevel;
}

export interface ConfigValidationResult {
  valid: boolean;
  config: ClientRuntimeConfig;
  errors: string[];
}

export const DEFAULT_RUNTIME_CONFIG: ClientRuntimeConfig = {
  appName: APP_NAME,
  minZoom: MIN_ZOOM,
  maxZoom: MAX_ZOOM,
  initialZoom: DEFAULT_ZOOM,
  initialCenter: DEFAULT_CENTER,
  viewportWidth: DEFAULT_VIEWPORT_WIDTH,
  viewportHeight: DEFAULT_VIEWPORT_HEIGHT,
  markerTextureUrl: MARKER_TEXTURE_URL,
  textureDpi: MARKER_TEXTURE_DPI,
  logLevel: 'info',
};

const INTEGER_FIELDS = [
  'viewportWidth',
  'viewportHeight',
] as const;

const POSITIVE_NUMBER_FIELDS = [
  'textureDpi',
] as const;

function isPositiveInt(value: unknown, field: string, errors: string[]): boolean {
  if (typeof value !== 'number' || Number.isNaN(value) || value <= 0) {
    errors.push(`${field} must be greater than 0`);
    return false;
  }
  if (!Number.isFinite(value)) {
    errors.push(`${field} must be finite`);
    return false;
  }
  if (!Number.isInteger(value)) {
    errors.push(`${field} must be an integer`);
    return false;
  }
  return true;
}

function isPositiveNumber(value: unknown, field: string, errors: string[]): boolean {
  if (typeof value !== 'number' || Number.isNaN(value) || value <= 0) {
    errors.push(`${field} must be greater than 0`);
    return false;
  }
  if (!Number.isFinite(value)) {
    errors.push(`${field} must be finite`);
    return false;
  }
  return true;
}

function isFiniteIn(value: number, min: number, max: number): boolean {
  return Number.isFinite(value) && value >= min && value <= max;
}

/**
 * Merge defaults with overrides and validate resulting runtime config.
 */
export function validateAndLoadConfig(
  overrides: Partial<ClientRuntimeConfig> = {},
): ConfigValidationResult {
  const config: ClientRuntimeConfig = { ...DEFAULT_RUNTIME_CONFIG, ...overrides };
  const errors: string[] = [];

  for (const field of INTEGER_FIELDS) {
    isPositiveInt(config[field], field, errors);
  }

  for (const field of POSITIVE_NUMBER_FIELDS) {
    isPositiveNumber(config[field], field, errors);
  }

  if (typeof config.appName !== 'string' || config.appName.trim().length === 0) {
    errors.push('appName must be a non-empty string');
  }

  if (config.markerTextureUrl.trim().length === 0) {
    errors.push('markerTextureUrl must be a non-empty string');
  }

  if (!isLogLevel(config.logLevel)) {
    errors.push(`logLevel must be one of debug, info, warn, error, got ${String(config.logLevel)}`);
  }

  if (config.minZoom < 0) {
    errors.push(`minZoom (${config.minZoom}) must not be negative`);
  }

  if (config.minZoom >= config.maxZoom) {
    errors.push(`minZoom (${config.minZoom}) must be smaller than maxZoom (${config.maxZoom})`);
  }

  if (!isFiniteIn(config.initialZoom, config.minZoom, config.maxZoom)) {
    errors.push(`initialZoom (${config.initialZoom}) must lie within [${config.minZoom}, ${config.maxZoom}]`);
  }

  const { lat, lng } = config.initialCenter;
  if (!isFiniteIn(lat, -MAX_LATITUDE, MAX_LATITUDE)) {
    errors.push(`initialCenter.lat (${lat}) must lie within ±${MAX_LATITUDE}`);
  }
  if (!isFiniteIn(lng, -180, 180)) {
    errors.push(`initialCenter.lng (${lng}) must lie within ±180`);
  }

  return {
    valid: errors.length === 0,
    config,
    errors,
  };
}

/**
 * Read camera overrides from a URL query string (`?lat=..&lng=..&zoom=..`).
 * Missing or non-numeric parameters are left out.
 */
export function parseQueryOverrides(search: string): Partial<ClientRuntimeConfig> {
  const params = new URLSearchParams(search);
  const overrides: Partial<ClientRuntimeConfig> = {};

  const lat = readNumber(params, 'lat');
  const lng = readNumber(params, 'lng');
  if (lat !== null || lng !== null) {
    overrides.initialCenter = {
      lat: lat ?? DEFAULT_CENTER.lat,
      lng: lng ?? DEFAULT_CENTER.lng,
    };
  }

  const zoom = readNumber(params, 'zoom');
  if (zoom !== null) overrides.initialZoom = zoom;

  const level = params.get('log');
  if (level !== null && isLogLevel(level)) overrides.logLevel = level;

  return overrides;
}

function readNumber(params: URLSearchParams, key: string): number | null {
  const raw = params.get(key);
  if (raw === null || raw.trim() === '') return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}
