import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
	resolve: {
		alias: {
			'@subforge/ass-vtt': fileURLToPath(
				new URL('./packages/ass-vtt/src/index.ts', import.meta.url),
			),
		},
	},
	test: {
		environment: 'node',
		globals: true,
		setupFiles: [],
		include: ['**/__tests__/**/*.test.ts'],
		exclude: ['node_modules', 'dist'],
	},
})
