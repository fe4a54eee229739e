import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

// Serves the demo page (index.html -> src/demo/main.tsx). The library itself is built with tsc.
export default defineConfig({
  base: './',
  plugins: [react()],
  build: { outDir: 'dist-demo' }
});
