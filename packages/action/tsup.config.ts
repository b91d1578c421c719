import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  splitting: false,
  clean: true,
  // The SDK workspace ships TypeScript sources only, so it is bundled in.
  noExternal: ['@workdrive-upload/sdk'],
});
