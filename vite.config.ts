import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';
import dts from 'vite-plugin-dts';

export default defineConfig({
    build: {
        target: 'node20',
        lib: {
            entry: fileURLToPath(new URL('src/index.ts', import.meta.url)),
            name: 'ACO',
            formats: ['es', 'cjs'],
            fileName: format => `aco.${format}.js`,
        },
        rollupOptions: {
            external: [/^node:/, 'fs', 'fs/promises', 'path', 'perf_hooks', 'zod', 'seedrandom', /^lodash/],
        },
        sourcemap: true,
        emptyOutDir: true,
    },
    plugins: [
        dts({
            insertTypesEntry: true,
            outDir: 'dist',
            exclude: ['**/*.test.ts', 'vite.config.ts', 'benchmark.ts'],
        }),
    ],
    define: {
        'import.meta.vitest': 'undefined',
    },
    test: {
        include: ['src/**/*.test.ts'],
        includeSource: ['src/**/*.ts'],
        environment: 'node',
    },
});
