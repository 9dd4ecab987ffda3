import { defineConfig } from 'vite';
import replace from '@rollup/plugin-replace';
import { fileURLToPath, URL } from 'node:url';

export default defineConfig({
    plugins: [
        replace({
            '__VERSION__': process.env.npm_package_version ?? '0.0.0',
            '__SYSTEM_INFO__': `${process.platform} ${process.arch} ${process.version}`,
            preventAssignment: true,
        }),
    ],
    build: {
        target: 'node20',
        outDir: 'dist',
        ssr: true,
        rollupOptions: {
            external: [
                // Dependencies from package.json
                '@hono/node-server',
                'commander',
                'dotenv',
                'dotenv/config',
                'hono',
                'hono/body-limit',
                'hono/cors',
                'hono/http-exception',
                'js-yaml',
                'openai',
                'winston',
                'zod',
                // Node.js built-in modules (node: prefix)
                /^node:/,
            ],
            input: {
                main: 'src/main.ts',
            },
            output: {
                format: 'esm',
                entryFileNames: '[name].js',
                chunkFileNames: '[name].js',
                banner: (chunk) => (chunk.name === 'main' ? '#!/usr/bin/env node' : ''),
            },
        },
        modulePreload: false,
        minify: false,
        sourcemap: true,
    },
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
});
