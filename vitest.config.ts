import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/**/*.test.ts'],
        watch: false,
        testTimeout: 10000,
    },
});
