import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/tests/**/*.test.ts'],
        environment: 'node',
        testTimeout: 15_000,
        env: {
            LOG_LEVEL: 'error',
            LOG_TO_FILE: 'false',
        },
    },
});
