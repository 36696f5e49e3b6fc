import { defineConfig } from 'tsup'

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    'cli/main': 'src/cli/main.ts',
  },
  outDir: 'dist',
  // ESM only: the CLI entry awaits at the top level.
  format: ['esm'],
  dts: false,
  clean: true,
  splitting: false,
  treeshake: true,
  sourcemap: false,
  minify: false,
  platform: 'node',
  target: 'node20',
  skipNodeModulesBundle: true,
})
