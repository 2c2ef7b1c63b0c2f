import { defineConfig } from '@refinaria/vitest-config';

export default defineConfig();
