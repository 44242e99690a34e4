import { defineConfig } from 'tsup'

/**
 * tsup configuration for memetic-pso
 *
 * - splitting: true → shared code extracted to chunks
 * - Unified build → all entries share common chunks
 */
export default defineConfig({
    name: 'memetic-pso',

    entry: {
        // ==================== Main Entries ====================
        // Default entry (all in-memory modules)
        index: 'index.ts',

        // Node.js entry (adds file loggers and dataset loading)
        node: 'node.ts',

        // Browser-safe entry
        browser: 'browser.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/models': 'src/models/index.ts',
        'src/tasks': 'src/tasks/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: true,
    treeshake: true,

    sourcemap: false,
    clean: true,

    // Node.js built-ins are resolved at runtime, never bundled
    external: [
        'fs',
        'path',
    ],

    outDir: 'dist',
    target: 'es2022',
    platform: 'neutral',
})
