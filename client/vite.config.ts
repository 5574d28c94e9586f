import { defineConfig } from 'vite';

export default defineConfig({
  server: {
    host: true,
    port: 5173,
  },
  preview: {
    port: 4173,
  },
  optimizeDeps: {
    include: ['three'],
  },
  build: {
    chunkSizeWarningLimit: 1500,
    rollupOptions: {
      output: {
        manualChunks(id): string | void {
          if (id.includes('node_modules/three/')) {
            return 'three';
          }
        },
      },
    },
  },
});
