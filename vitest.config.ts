import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            '@qfx-convert/shared': source('shared'),
            '@qfx-convert/core': source('core'),
        },
    },
    test: {
        environment: 'node',
        include: ['packages/*/tests/**/*.test.ts'],
    },
});
