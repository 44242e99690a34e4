import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['__tests__/**/*.test.ts'],
        exclude: [
            'node_modules',
            'dist',
        ],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'json', 'html'],
            include: [
                'src/**/*.ts',
            ],
            exclude: [
                '__tests__/**',
                'node_modules/**',
                'dist/**',
                '*.config.ts',
                '**/cli.ts',
            ],
            thresholds: {
                lines: 70,
                functions: 70,
                branches: 60,
                statements: 70,
            },
        },
        testTimeout: 30000,
        hookTimeout: 10000,
        pool: 'forks',
        reporters: ['default'],
        passWithNoTests: false,
    },
});
