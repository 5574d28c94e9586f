/**
 * Application entry point.
 *
 * Validates config, creates the Engine, the marker layer, the map controls
 * and the overlay store, then wires them together:
 *
 *   controls / resize / texture load  →  store.dispatch  →  update
 *   engine frame                      →  view(model)     →  layer.sync
 *
 * The icon texture is requested once; its outcome is fed to the store once.
 */

import { MapControls } from './camera/mapControls';
import { parseQueryOverrides, validateAndLoadConfig } from './config';
import { createLogger, setLogLevel } from './core/logger';
import { Engine } from './engine/Engine';
import { OverlayStore } from './overlay/store';
import { view } from './overlay/view';
import { MarkerLayer } from './rendering/markerLayer';
import { getStartupChecks, summarizeStartupChecks } from './startup';
import { loadMarkerTexture } from './world/markerTexture';
import { SAMPLE_MARKERS } from './world/sampleMarkers';

const log = createLogger('Main');

// ── Status line ──────────────────────────────────────────────────

function createStatus(mountPoint: HTMLElement): { set(text: string): void; dispose(): void } {
  const statusEl = document.createElement('div');
  statusEl.id = 'status';
  statusEl.textContent = 'Loading markers...';
  mountPoint.appendChild(statusEl);
  return {
    set(text: string): void {
      statusEl.textContent = text;
    },
    dispose(): void {
      statusEl.remove();
    },
  };
}

// ── Bootstrap ────────────────────────────────────────────────────

async function init(): Promise<void> {
  const app = document.querySelector<HTMLDivElement>('#app');
  if (!app) throw new Error('App mount point #app missing');

  const loaded = validateAndLoadConfig({
    ...parseQueryOverrides(window.location.search),
    viewportWidth: window.innerWidth,
    viewportHeight: window.innerHeight,
  });
  for (const error of loaded.errors) log.warn(`Config: ${error}`);
  const config = loaded.valid
    ? loaded.config
    : validateAndLoadConfig({ viewportWidth: window.innerWidth, viewportHeight: window.innerHeight }).config;
  setLogLevel(config.logLevel);

  const report = getStartupChecks(loaded);
  log.info(summarizeStartupChecks(report));
  if (!report.ok) throw new Error(summarizeStartupChecks(report));

  const engine = new Engine(app);
  const store = new OverlayStore(config);
  const layer = new MarkerLayer();
  engine.scene.add(layer.object);

  const status = createStatus(app);

  const controls = new MapControls(
    engine.renderer.domElement,
    () => store.model.camera,
    (camera) => store.dispatch({ type: 'camera_moved', camera }),
  );

  // ── Event listeners ───────────────────────────────────────────

  const unsubMesh = store.events.on('mesh_rebuilt', ({ markers, triangles }) => {
    status.set(`${markers} markers, ${triangles} triangles`);
  });
  const unsubFailed = store.events.on('texture_failed', ({ url }) => {
    status.set(`Marker icon unavailable (${url})`);
  });

  // ── Frame / Resize / Dispose ──────────────────────────────────

  engine.onFrame(() => layer.sync(view(store.model)));
  engine.onResize((width, height) => {
    store.dispatch({ type: 'viewport_resized', viewport: { width, height } });
  });
  engine.onDispose(() => {
    unsubMesh();
    unsubFailed();
    controls.dispose();
    layer.dispose();
    status.dispose();
  });

  // ── Start ─────────────────────────────────────────────────────

  store.dispatch({ type: 'markers_changed', markers: SAMPLE_MARKERS });
  engine.start();

  store.completeTextureLoad(await loadMarkerTexture(config.markerTextureUrl));
}

init().catch((e: unknown) => {
  log.error('Failed to initialize:', e);
});
