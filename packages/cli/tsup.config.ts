import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  splitting: false,
  sourcemap: false,
  dts: false,
  // Bundle the workspace core package into the output
  noExternal: ['@corroborate/core'],
  // npm dependencies resolve from node_modules at run time
  external: [
    'ai',
    '@ai-sdk/anthropic',
    '@ai-sdk/openai',
    '@ai-sdk/google',
    'chalk',
    'commander',
    'eventemitter3',
    'yaml',
    'zod',
  ],
});
