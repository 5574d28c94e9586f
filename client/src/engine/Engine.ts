/**
 * Engine: frame loop and rendering infrastructure.
 *
 * Owns the Three.js renderer, scene and camera, and the frame loop.
 * The Engine handles only:
 *   - Scene, camera, renderer setup
 *   - The frame loop (requestAnimationFrame)
 *   - Window resize propagation
 *   - Dispose callback management
 *
 * Overlay state lives in OverlayStore; frame callbacks registered by
 * main.ts push it into the scene before each render.
 *
 * The marker program positions vertices itself, so the camera is a fixed
 * unit orthographic camera that three.js needs only to call render().
 */

import * as THREE from 'three';
import { APP_NAME, BACKGROUND_COLOR, MAX_PIXEL_RATIO } from '../config';
import { createLogger } from '../core/logger';

const log = createLogger('Engine');

/** The slice of THREE.WebGLRenderer the engine relies on. */
export interface EngineRenderer {
  readonly domElement: HTMLCanvasElement;
  setPixelRatio(ratio: number): void;
  setSize(width: number, height: number): void;
  render(scene: THREE.Scene, camera: THREE.Camera): void;
  dispose(): void;
}

export type RendererFactory = () => EngineRenderer;

const webglRendererFactory: RendererFactory = () =>
  new THREE.WebGLRenderer({ antialias: true, alpha: false });

// ── Engine ────────────────────────────────────────────────────────

export class Engine {
  readonly scene: THREE.Scene;
  readonly camera: THREE.OrthographicCamera;
  readonly renderer: EngineRenderer;
  readonly clock = new THREE.Clock();

  /** DOM element the renderer canvas lives in. */
  readonly container: HTMLDivElement;

  private running = false;
  private animationFrameId = 0;
  private frameCallbacks: ((deltaTime: number) => void)[] = [];
  private disposeCallbacks: (() => void)[] = [];
  private resizeCallbacks: ((width: number, height: number) => void)[] = [];

  constructor(mountPoint: HTMLElement, createRenderer: RendererFactory = webglRendererFactory) {
    // Canvas container
    this.container = document.createElement('div');
    this.container.style.width = '100%';
    this.container.style.height = '100%';
    mountPoint.appendChild(this.container);

    // Scene
    this.scene = new THREE.Scene();
    this.scene.background = new THREE.Color(BACKGROUND_COLOR);

    // Camera
    this.camera = new THREE.OrthographicCamera(-1, 1, 1, -1, 0, 1);

    // Renderer
    this.renderer = createRenderer();
    this.renderer.setPixelRatio(Math.min(window.devicePixelRatio, MAX_PIXEL_RATIO));
    this.renderer.setSize(window.innerWidth, window.innerHeight);
    this.container.appendChild(this.renderer.domElement);

    // Resize
    window.addEventListener('resize', this.handleResize);

    log.info(`${APP_NAME} engine created`);
  }

  // ── Lifecycle Callbacks ─────────────────────────────────────────

  /** Register a callback to run before each render. */
  onFrame(fn: (deltaTime: number) => void): void {
    this.frameCallbacks.push(fn);
  }

  /** Register a callback to run on engine dispose. */
  onDispose(fn: () => void): void {
    this.disposeCallbacks.push(fn);
  }

  /** Register a callback to run on window resize. */
  onResize(fn: (width: number, height: number) => void): void {
    this.resizeCallbacks.push(fn);
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ── Lifecycle ─────────────────────────────────────────────────

  /** Start the render loop. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.clock.start();
    this.animate();
    log.info('Render loop started');
  }

  /** Stop the render loop and dispose everything. */
  stop(): void {
    this.running = false;
    cancelAnimationFrame(this.animationFrameId);

    for (const fn of this.disposeCallbacks) {
      fn();
    }
    this.disposeCallbacks = [];
    this.resizeCallbacks = [];
    this.frameCallbacks = [];

    window.removeEventListener('resize', this.handleResize);
    this.renderer.dispose();
    this.container.remove();
    log.info('Engine stopped');
  }

  // ── Render Loop ───────────────────────────────────────────────

  private animate = (): void => {
    if (!this.running) return;
    this.animationFrameId = requestAnimationFrame(this.animate);

    const deltaTime = this.clock.getDelta();
    for (const fn of this.frameCallbacks) {
      fn(deltaTime);
    }
    this.renderer.render(this.scene, this.camera);
  };

  // ── Resize ────────────────────────────────────────────────────

  private handleResize = (): void => {
    const w = window.innerWidth;
    const h = window.innerHeight;
    this.renderer.setSize(w, h);

    for (const fn of this.resizeCallbacks) {
      fn(w, h);
    }
  };
}
