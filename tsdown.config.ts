import { defineConfig } from 'tsdown';

export default defineConfig({
    entry: ['src/index.ts', 'src/executor.ts'],
    format: 'esm',
    platform: 'node',
    target: 'node20',
    outDir: 'dist',
    clean: true,
    external: [
        '@hono/node-server',
        'hono',
        'async-mutex',
        'cheerio',
        'dotenv',
        'nanoid',
        'playwright-core',
        'undici',
        'zod',
    ],
});
