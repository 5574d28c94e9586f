/**
 * MarkerLayer: the three.js side of the marker overlay.
 *
 * Owns one THREE.Mesh drawn with the raw marker program. Geometry is
 * re-uploaded only when the draw call carries a new meshVersion; uniforms
 * and the texture handle are refreshed on every sync.
 *
 * Quads are wound clockwise in clip space (see quadMesher), so the material
 * is double sided rather than relying on the default front face.
 */

import * as THREE from 'three';
import { createLogger } from '../core/logger';
import { meshIndices } from '../world/quadMesher';
import type { MarkerDrawCall } from '../overlay/view';
import type { MarkerVertex, Mesh, Vec2 } from '../types';
import { MARKER_FRAGMENT_SHADER, MARKER_VERTEX_SHADER } from './markerShaders';

const log = createLogger('MarkerLayer');

/** Positions are stored relative to `origin`; see computeMarkerUniforms. */
export function meshToGeometry(mesh: Mesh<MarkerVertex>, origin: Vec2): THREE.BufferGeometry {
  const count = mesh.vertices.length;
  const positions = new Float32Array(count * 2);
  const offsets = new Float32Array(count * 2);
  const uvs = new Float32Array(count * 2);

  mesh.vertices.forEach((v, i) => {
    positions[i * 2] = v.position.x - origin.x;
    positions[i * 2 + 1] = v.position.y - origin.y;
    offsets[i * 2] = v.offset.x;
    offsets[i * 2 + 1] = v.offset.y;
    uvs[i * 2] = v.texCoord.x;
    uvs[i * 2 + 1] = v.texCoord.y;
  });

  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute('position', new THREE.BufferAttribute(positions, 2));
  geometry.setAttribute('offset', new THREE.BufferAttribute(offsets, 2));
  geometry.setAttribute('uv', new THREE.BufferAttribute(uvs, 2));
  geometry.setIndex(new THREE.BufferAttribute(meshIndices(mesh), 1));
  return geometry;
}

export class MarkerLayer {
  readonly object: THREE.Mesh<THREE.BufferGeometry, THREE.RawShaderMaterial>;
  private readonly material: THREE.RawShaderMaterial;
  private meshVersion = 0;

  constructor() {
    this.material = new THREE.RawShaderMaterial({
      vertexShader: MARKER_VERTEX_SHADER,
      fragmentShader: MARKER_FRAGMENT_SHADER,
      uniforms: {
        uView: { value: new THREE.Matrix4() },
        uAspect: { value: 1 },
        uZoom: { value: 1 },
        uViewportHeight: { value: 1 },
        uTexture: { value: null },
      },
      transparent: true,
      depthTest: false,
      depthWrite: false,
      side: THREE.DoubleSide,
    });

    this.object = new THREE.Mesh(new THREE.BufferGeometry(), this.material);
    this.object.name = 'markers';
    // 2-component positions: three's bounding sphere would read garbage z
    this.object.frustumCulled = false;
    this.object.visible = false;
  }

  /** Bring the GPU-side objects in line with the latest draw call. */
  sync(drawCall: MarkerDrawCall | null): void {
    if (!drawCall) {
      this.object.visible = false;
      return;
    }

    if (drawCall.meshVersion !== this.meshVersion) {
      const previous = this.object.geometry;
      this.object.geometry = meshToGeometry(drawCall.mesh, drawCall.origin);
      previous.dispose();
      this.meshVersion = drawCall.meshVersion;
      log.debug(`Uploaded mesh v${drawCall.meshVersion} (${drawCall.mesh.vertices.length} vertices)`);
    }

    const uniforms = this.material.uniforms;
    setUniform(uniforms, 'uView', drawCall.uniforms.uView);
    setUniform(uniforms, 'uAspect', drawCall.uniforms.uAspect);
    setUniform(uniforms, 'uZoom', drawCall.uniforms.uZoom);
    setUniform(uniforms, 'uViewportHeight', drawCall.uniforms.uViewportHeight);
    setUniform(uniforms, 'uTexture', drawCall.texture);

    this.object.visible = drawCall.mesh.triangles.length > 0;
  }

  get uploadedVersion(): number {
    return this.meshVersion;
  }

  dispose(): void {
    this.object.geometry.dispose();
    this.material.dispose();
  }
}

function setUniform(uniforms: Record<string, THREE.IUniform>, name: string, value: unknown): void {
  const uniform = uniforms[name];
  if (uniform) uniform.value = value;
}
