import { defineConfig } from 'tsup'

/**
 * tsup configuration for numvec
 *
 * - Dual CJS/ESM output with declarations
 * - Sub-path entries for the vector and core modules
 */
export default defineConfig({
    name: 'numvec',

    entry: {
        index: 'index.ts',

        // ==================== Sub-path Exports ====================
        'src/vector': 'src/vector/index.ts',
        'src/core': 'src/core/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: true,
    treeshake: true,

    sourcemap: false,
    clean: true,

    outDir: 'dist',
    target: 'es2022',

    platform: 'neutral',
})
