import { defineConfig } from 'tsup';

export default defineConfig([
  // Library entry — ESM with .d.ts for xterm.js hosts
  {
    entry: { index: 'src/index.ts' },
    format: ['esm'],
    target: 'node20',
    dts: true,
    sourcemap: true,
    clean: true,
    external: ['@xterm/xterm'],
  },
  // CLI entry — self-contained bundle; @clack/prompts is loaded only by `sweeper setup`
  {
    entry: { cli: 'src/cli.ts' },
    format: ['esm'],
    target: 'node20',
    sourcemap: true,
    banner: { js: '#!/usr/bin/env node' },
    external: ['@xterm/xterm'],
  },
]);
