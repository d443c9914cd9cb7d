import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/cli.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  dts: false,
  target: 'node20',
  platform: 'node',
  // Bundle @fieldcheck/core so the published CLI does not load TypeScript sources.
  noExternal: [/^@fieldcheck\//],
});
