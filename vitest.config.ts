import path from 'path';
import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));
const source = (file: string) => path.resolve(root, 'packages', file);

export default defineConfig({
    resolve: {
        // Workspace packages export dist/ at run time; tests run against src/
        alias: [
            { find: /^@fieldkit\/core\/test-utils$/, replacement: source('core/src/test-utils.ts') },
            { find: /^@fieldkit\/core$/, replacement: source('core/src/index.ts') },
            { find: /^@fieldkit\/plugin-hello$/, replacement: source('plugin-hello/src/index.ts') },
            {
                find: /^@fieldkit\/plugin-management$/,
                replacement: source('plugin-management/src/index.ts'),
            },
            { find: /^@fieldkit\/cli$/, replacement: source('cli/src/program.ts') },
        ],
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts'],
        testTimeout: 15_000,
    },
});
