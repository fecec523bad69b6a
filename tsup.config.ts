import { defineConfig } from 'tsup'

/**
 * tsup configuration for the d2d-radio library
 *
 * - splitting: true → sub-path entries share common chunks
 * - dts: true → declaration files for every entry
 */
export default defineConfig({
    name: 'd2d-radio',

    entry: {
        // ==================== Main Entry ====================
        index: 'index.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/device': 'src/models/device/index.ts',
        'src/link': 'src/models/link/index.ts',
        'src/units': 'src/models/utils/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: true,
    treeshake: true,

    sourcemap: false,
    clean: true,

    outDir: 'dist',
    target: 'es2021',

    platform: 'neutral',
})
