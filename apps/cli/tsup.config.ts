import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  clean: true,
  splitting: false,
  treeshake: true,
  // Workspace packages export TypeScript sources, so they are bundled in
  noExternal: [/^@coinbridge\//],
  // pino resolves its transports by file name at run time
  external: ['pino', 'pino-pretty', 'ccxt'],
});
