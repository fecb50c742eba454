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
  // Workspace packages export TypeScript sources, so they are bundled in
  noExternal: ['@autopsy/core', '@autopsy/tools'],
  external: [
    'ai',
    '@ai-sdk/anthropic',
    '@ai-sdk/openai',
    '@ai-sdk/google',
    'chalk',
    'commander',
    'eventemitter3',
    'ora',
    'yaml',
    'zod',
  ],
});
