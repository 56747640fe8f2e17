import type { Options } from 'tsup';

/**
 * Bundles an executable for Node.js with the workspace packages inlined,
 * since they only publish their TypeScript sources.
 */
export const defineConfig = (options: Options = {}): Options => {
  return {
    format: ['esm'],
    platform: 'node',
    target: 'node20',
    clean: true,
    sourcemap: true,
    noExternal: [/^@codetable\//],
    ...options,
  };
};
