import { defineConfig } from 'tsdown';

export default defineConfig({
	entry: [
		'./index.ts',
	],
	outDir: 'dist',
	format: 'esm',
	platform: 'node',
	target: 'node20',
	clean: true,
	sourcemap: false,
	minify: 'dce-only',
	treeshake: true,
	nodeProtocol: true,
	define: {
		'import.meta.vitest': 'undefined',
	},
});
