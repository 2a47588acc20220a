import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['test/**/*.test.ts'],
        // the deep-chain tests build trees of 100k nodes
        testTimeout: 30_000,
    },
});
