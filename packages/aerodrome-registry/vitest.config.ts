import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        name: 'aerodrome-registry',
        include: ['src/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        testTimeout: 10000,
        pool: 'forks',
        environment: 'node',
    },
});
