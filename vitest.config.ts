import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        setupFiles: ['./tests/setup.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'json', 'html'],
            exclude: ['node_modules/', 'dist/', 'tests/', 'examples/', 'src/bin/'],
            thresholds: {
                // Engine adapters (pdf-to-img, tesseract, compromise) are exercised only end to end
                lines: 60,
                functions: 60,
                branches: 60,
                statements: 60,
            },
        },
        testTimeout: 30000,
    },
});
