import type { Options } from 'tsup';

export const defineConfig = (options: Options = {}): Options => {
  return {
    format: ['cjs'],
    target: 'node20',
    platform: 'node',
    clean: true,
    sourcemap: true,
    ...options,
  };
};
