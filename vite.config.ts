import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vite';

export default defineConfig({
	build: {
		lib: {
			entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
			formats: ['es'],
			fileName: () => 'cellboard.js',
		},
		outDir: 'dist',
		emptyOutDir: true,
		sourcemap: true,
		target: 'es2022',
	},
});
