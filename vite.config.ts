import { defineConfig } from 'vite';
import { viteSingleFile } from 'vite-plugin-singlefile';

export default defineConfig({
  plugins: [viteSingleFile()],
  base: './',  // Use relative paths - content/*.json is fetched beside index.html
  build: {
    outDir: 'dist',
    assetsInlineLimit: 100000,
  },
});
