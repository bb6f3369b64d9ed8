import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

// The API server listens on 8787 unless PORT overrides it.
const apiTarget = `http://localhost:${process.env.PORT ?? '8787'}`;

export default defineConfig({
  plugins: [react()],
  server: {
    proxy: {
      '/api': {
        target: apiTarget,
        changeOrigin: true,
        rewrite: (path) => path.replace(/^\/api/, ''),
      },
    },
  },
  build: {
    outDir: 'dist',
  },
});
