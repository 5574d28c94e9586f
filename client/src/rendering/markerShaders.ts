/**
 * GLSL ES 1.0 source for the marker program (RawShaderMaterial, so every
 * attribute and uniform is declared here).
 *
 * Uniform names avoid three.js built-ins such as `viewMatrix`, which the
 * renderer would overwrite with the camera's own matrix.
 */

import { ALPHA_DISCARD_THRESHOLD } from '../config';

export const MARKER_VERTEX_SHADER = /* glsl */ `
precision highp float;

attribute vec2 position;
attribute vec2 offset;
attribute vec2 uv;

uniform mat4 uView;
uniform float uAspect;
uniform float uZoom;
uniform float uViewportHeight;

varying vec2 vUv;

void main() {
  vec4 anchor = uView * vec4(position * uZoom, 0.0, 1.0);
  vec2 corner = vec2(offset.x / uAspect, offset.y) * (2.0 / uViewportHeight);
  gl_Position = anchor + vec4(corner, 0.0, 0.0);
  vUv = uv;
}
`;

export const MARKER_FRAGMENT_SHADER = /* glsl */ `
precision mediump float;

uniform sampler2D uTexture;

varying vec2 vUv;

void main() {
  vec4 color = texture2D(uTexture, vUv);
  if (color.a < ${ALPHA_DISCARD_THRESHOLD.toFixed(2)}) discard;
  gl_FragColor = color;
}
`;
