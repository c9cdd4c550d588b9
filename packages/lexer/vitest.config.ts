import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'lexer',
		environment: 'node',
		include: ['src/**/*.test.ts'],
	},
})
