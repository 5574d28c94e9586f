/**
 * Marker quad generation.
 *
 * Each marker becomes four MarkerVertex records in (bottom-left,
 * bottom-right, top-right, top-left) order, the layout buildMesh expects.
 * All four corners share the marker's projected anchor; they differ only in
 * their screen-space offset and texture coordinate.
 */

import { DEFAULT_MARKER_ANCHOR } from '../config';
import { lngLatToWorld } from '../core/mercator';
import type { Marker, MarkerStyle, MarkerVertex, Vec2 } from '../types';

export type MarkerQuad = readonly [MarkerVertex, MarkerVertex, MarkerVertex, MarkerVertex];

/** Corner UVs in BL, BR, TR, TL order. */
const CORNER_UVS: readonly [Vec2, Vec2, Vec2, Vec2] = [
  { x: 0, y: 0 },
  { x: 1, y: 0 },
  { x: 1, y: 1 },
  { x: 0, y: 1 },
];

/**
 * Size a marker from its icon texture. The artwork is authored at `dpi`
 * device pixels per CSS pixel.
 */
export function markerStyleFromTexture(
  width: number,
  height: number,
  dpi: number,
  anchor: Vec2 = DEFAULT_MARKER_ANCHOR,
): MarkerStyle {
  return { width: width / dpi, height: height / dpi, anchor };
}

export function markerQuad(marker: Marker, fallbackStyle: MarkerStyle): MarkerQuad {
  const style = marker.style ?? fallbackStyle;
  const position = lngLatToWorld(marker.position);
  const ax = style.anchor.x * style.width;
  const ay = style.anchor.y * style.height;
  const left = 0 - ax;
  const right = style.width - ax;
  const bottom = 0 - ay;
  const top = style.height - ay;

  const [uvBL, uvBR, uvTR, uvTL] = CORNER_UVS;
  return [
    { position, offset: { x: left, y: bottom }, texCoord: uvBL },
    { position, offset: { x: right, y: bottom }, texCoord: uvBR },
    { position, offset: { x: right, y: top }, texCoord: uvTR },
    { position, offset: { x: left, y: top }, texCoord: uvTL },
  ];
}

export function markerVertices(markers: readonly Marker[], style: MarkerStyle): MarkerVertex[] {
  const vertices: MarkerVertex[] = [];
  for (const marker of markers) {
    vertices.push(...markerQuad(marker, style));
  }
  return vertices;
}
