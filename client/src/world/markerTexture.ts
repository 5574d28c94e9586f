/**
 * Async loader for the marker icon texture.
 *
 * Resolves to a Result instead of rejecting: a failed load is an expected
 * outcome that gates whether a marker mesh is ever built.
 */

import * as THREE from 'three';
import { createLogger } from '../core/logger';
import type { LoadedTexture, Result } from '../types';
import { err, ok } from '../types';

const log = createLogger('MarkerTexture');

/** Anything that can turn a URL into a three.js texture. */
export type TextureSource = (url: string) => Promise<THREE.Texture>;

export const threeTextureSource: TextureSource = (url) => {
  const loader = new THREE.TextureLoader();
  loader.setCrossOrigin('anonymous');
  return loader.loadAsync(url);
};

function readImageSize(image: unknown): { width: number; height: number } | null {
  if (typeof image !== 'object' || image === null) return null;
  if (!('width' in image) || !('height' in image)) return null;
  const { width, height } = image;
  if (typeof width !== 'number' || typeof height !== 'number') return null;
  if (width <= 0 || height <= 0) return null;
  return { width, height };
}

function toError(cause: unknown): Error {
  return cause instanceof Error ? cause : new Error(String(cause));
}

export async function loadMarkerTexture(
  url: string,
  source: TextureSource = threeTextureSource,
): Promise<Result<LoadedTexture, Error>> {
  let texture: THREE.Texture;
  try {
    texture = await source(url);
  } catch (cause) {
    const error = toError(cause);
    log.warn(`Failed to load ${url}: ${error.message}`);
    return err(error);
  }

  const size = readImageSize(texture.image);
  if (!size) {
    texture.dispose();
    log.warn(`Texture ${url} has no usable image size`);
    return err(new Error(`Texture ${url} has no usable image size`));
  }

  texture.colorSpace = THREE.SRGBColorSpace;
  texture.minFilter = THREE.LinearFilter;
  texture.magFilter = THREE.LinearFilter;
  texture.generateMipmaps = false;
  texture.needsUpdate = true;

  log.info(`Marker texture loaded: ${size.width}x${size.height}`);
  return ok({ texture, width: size.width, height: size.height });
}
