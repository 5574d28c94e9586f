/**
 * MapControls: mouse drag pans, wheel zooms.
 *
 * Reads the current camera through a getter and reports the moved camera
 * through a callback; clamping is left to the overlay's update function.
 */

import { WHEEL_ZOOM_RATE } from '../config';
import { lngLatToWorld, worldToLngLat, zoomScale } from '../core/mercator';
import type { MapCamera } from '../types';

/**
 * Move the camera so the map follows a drag of (dx, dy) screen pixels,
 * dx to the right and dy downwards.
 */
export function panCamera(camera: MapCamera, dx: number, dy: number): MapCamera {
  const scale = zoomScale(camera.zoom);
  const world = lngLatToWorld(camera.center);
  const center = worldToLngLat({ x: world.x - dx / scale, y: world.y - dy / scale });
  return { center, zoom: camera.zoom };
}

export function zoomCamera(camera: MapCamera, delta: number): MapCamera {
  return { center: camera.center, zoom: camera.zoom + delta };
}

export class MapControls {
  private readonly domElement: HTMLElement;
  private readonly getCamera: () => MapCamera;
  private readonly onChange: (camera: MapCamera) => void;

  private dragging = false;
  private lastX = 0;
  private lastY = 0;

  private readonly boundMouseDown: (e: MouseEvent) => void;
  private readonly boundMouseMove: (e: MouseEvent) => void;
  private readonly boundMouseUp: () => void;
  private readonly boundWheel: (e: WheelEvent) => void;

  constructor(
    domElement: HTMLElement,
    getCamera: () => MapCamera,
    onChange: (camera: MapCamera) => void,
  ) {
    this.domElement = domElement;
    this.getCamera = getCamera;
    this.onChange = onChange;

    this.boundMouseDown = this.onMouseDown.bind(this);
    this.boundMouseMove = this.onMouseMove.bind(this);
    this.boundMouseUp = this.onMouseUp.bind(this);
    this.boundWheel = this.onWheel.bind(this);

    this.domElement.addEventListener('mousedown', this.boundMouseDown);
    window.addEventListener('mousemove', this.boundMouseMove);
    window.addEventListener('mouseup', this.boundMouseUp);
    this.domElement.addEventListener('wheel', this.boundWheel, { passive: false });
  }

  dispose(): void {
    this.domElement.removeEventListener('mousedown', this.boundMouseDown);
    window.removeEventListener('mousemove', this.boundMouseMove);
    window.removeEventListener('mouseup', this.boundMouseUp);
    this.domElement.removeEventListener('wheel', this.boundWheel);
  }

  private onMouseDown(e: MouseEvent): void {
    if (e.button !== 0) return;
    this.dragging = true;
    this.lastX = e.clientX;
    this.lastY = e.clientY;
  }

  private onMouseMove(e: MouseEvent): void {
    if (!this.dragging) return;
    const dx = e.clientX - this.lastX;
    const dy = e.clientY - this.lastY;
    this.lastX = e.clientX;
    this.lastY = e.clientY;
    if (dx === 0 && dy === 0) return;
    this.onChange(panCamera(this.getCamera(), dx, dy));
  }

  private onMouseUp(): void {
    this.dragging = false;
  }

  private onWheel(e: WheelEvent): void {
    e.preventDefault();
    if (e.deltaY === 0) return;
    this.onChange(zoomCamera(this.getCamera(), -e.deltaY * WHEEL_ZOOM_RATE));
  }
}
