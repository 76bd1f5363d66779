import { defineConfig } from 'tsup'

export default defineConfig({
  entry: ['src/cli.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  target: 'node20',
  // @zoo/core ships TypeScript sources, so it is bundled in.
  noExternal: ['@zoo/core'],
  banner: {
    js: '#!/usr/bin/env node',
  },
})
