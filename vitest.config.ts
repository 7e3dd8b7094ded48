// vitest.config.ts
import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['src/**/__tests__/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        env: {
            LOG_LEVEL: 'error',
        },
        watch: false,
        clearMocks: true,
        restoreMocks: true,
    },
});
