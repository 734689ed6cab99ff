import { defineConfig } from 'tsup';

export default defineConfig({
    entry: ['src/index.ts', 'src/cli.ts'],
    format: ['esm'],
    dts: true,
    clean: true,
    sourcemap: true,
    minify: false,
    platform: 'node',
    target: 'node20',
    outDir: 'bundle',
    // Keep runtime dependencies external so consumers resolve a single copy.
    external: [
        'cheerio',
        'domhandler',
        'zod',
    ],
});
