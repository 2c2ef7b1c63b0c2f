import { defineConfig } from '@refinaria/tsup-config';

export default defineConfig({
  entry: { cli: 'src/cli.ts' },
  noExternal: [/^@refinaria\//],
});
