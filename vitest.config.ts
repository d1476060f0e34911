import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // koffi and tree-sitter are native addons; run every file in a child
    // process, one at a time. koffi's type registry is per process, so
    // `eraASTROM` and each prototype name is registered once per file.
    fileParallelism: false,
    pool: 'forks',
    maxWorkers: 1,
    minWorkers: 1,
  },
});
