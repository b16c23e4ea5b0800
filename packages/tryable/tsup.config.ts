import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point
    index: 'src/index.ts',

    // =========================================================================
    // Try variants
    // =========================================================================
    try: 'src/try.ts',
    'try-catch-all': 'src/try-catch-all.ts',
    core: 'src/core-entry.ts',

    // =========================================================================
    // Callbacks and errors
    // =========================================================================
    throwing: 'src/throwing-entry.ts',
    unchecker: 'src/unchecker-entry.ts',
    errors: 'src/errors-entry.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
